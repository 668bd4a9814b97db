import { z } from 'zod';

/** Format and algorithm names end up in key file names */
const keyNameToken = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, 'must contain only letters, digits, "_" or "-"');

export const cachedKeySchema = z.object({
  format: keyNameToken,
  keyAlg: keyNameToken,
  privateKey: z.string(),
});

/** Body of POST /PasswordVault/API/Users/Secret/SSHKeys/Cache/ */
export const cachedKeysResponseSchema = z.object({
  /** Epoch seconds */
  expirationTime: z
    .number()
    .int()
    .nonnegative()
    .refine((seconds) => !Number.isNaN(new Date(seconds * 1000).getTime()), 'is not a valid date'),
  publicKey: z.string().nullish(),
  value: z.array(cachedKeySchema),
});

export type CachedKeysResponse = z.infer<typeof cachedKeysResponseSchema>;
