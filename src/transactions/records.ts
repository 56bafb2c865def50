/**
 * Credential records held behind a token
 */

import { z } from 'zod';
import { MihomoPlayerSchema } from '../upstream/mihomo/models.js';

export const HoyolabRecordSchema = z.object({
  kind: z.literal('hoyolab'),
  uid: z.number().int().positive(),
  ltuid: z.number().int().positive(),
  ltoken: z.string().min(1),
  lcookie: z.string().min(1).optional(),
  lmid: z.string().min(1).optional(),
});

export type HoyolabRecord = z.infer<typeof HoyolabRecordSchema>;

export const MihomoRecordSchema = z.object({
  kind: z.literal('mihomo'),
  uid: z.number().int().positive(),
  /** Player snapshot taken at exchange time */
  cached: MihomoPlayerSchema,
});

export type MihomoRecord = z.infer<typeof MihomoRecordSchema>;

export type CredentialRecord = HoyolabRecord | MihomoRecord;
