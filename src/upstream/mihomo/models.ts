/**
 * Mihomo parsed player payload (`sr_info_parsed`, version 2)
 */

import { z } from 'zod';

const NamedIconSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    icon: z.string().optional(),
  })
  .passthrough();

const AttributeSchema = z
  .object({
    field: z.string(),
    name: z.string(),
    value: z.number(),
    display: z.string(),
    percent: z.boolean().default(false),
  })
  .passthrough();

const AffixSchema = z
  .object({
    type: z.string(),
    name: z.string(),
    display: z.string(),
  })
  .passthrough();

const RelicSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    set_name: z.string(),
    rarity: z.number(),
    level: z.number(),
    main_affix: AffixSchema,
    sub_affix: z.array(AffixSchema).default([]),
  })
  .passthrough();

const LightConeSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    rarity: z.number(),
    rank: z.number(),
    level: z.number(),
    promotion: z.number(),
  })
  .passthrough();

const SkillSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    level: z.number(),
    max_level: z.number(),
    type_text: z.string().optional(),
  })
  .passthrough();

export const MihomoCharacterSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    rarity: z.number(),
    rank: z.number(),
    level: z.number(),
    promotion: z.number(),
    path: NamedIconSchema,
    element: NamedIconSchema.extend({ color: z.string().optional() }).passthrough(),
    skills: z.array(SkillSchema).default([]),
    light_cone: LightConeSchema.nullable().default(null),
    relics: z.array(RelicSchema).default([]),
    attributes: z.array(AttributeSchema).default([]),
    additions: z.array(AttributeSchema).default([]),
  })
  .passthrough();

export type MihomoCharacter = z.infer<typeof MihomoCharacterSchema>;

export const MihomoPlayerInfoSchema = z
  .object({
    uid: z.string(),
    nickname: z.string(),
    level: z.number(),
    world_level: z.number().default(0),
    friend_count: z.number().default(0),
    signature: z.string().default(''),
    avatar: NamedIconSchema.optional(),
    space_info: z
      .object({
        achievement_count: z.number().default(0),
        avatar_count: z.number().default(0),
        light_cone_count: z.number().default(0),
        universe_level: z.number().default(0),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type MihomoPlayerInfo = z.infer<typeof MihomoPlayerInfoSchema>;

/**
 * A player snapshot: profile plus the characters on display
 */
export const MihomoPlayerSchema = z
  .object({
    player: MihomoPlayerInfoSchema,
    characters: z.array(MihomoCharacterSchema).default([]),
  })
  .passthrough();

export type MihomoPlayer = z.infer<typeof MihomoPlayerSchema>;
