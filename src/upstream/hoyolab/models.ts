/**
 * HoYoLAB battle chronicle payloads
 *
 * Only the fields the cards read are typed; everything else is kept with
 * passthrough() so the info routes can serve the payload as received.
 */

import { z } from 'zod';

/**
 * `{retcode, message, data}` wrapper around every chronicle response
 */
export const EnvelopeSchema = z.object({
  retcode: z.number(),
  message: z.string().default(''),
  data: z.unknown().nullable().optional(),
});

const AvatarSummarySchema = z
  .object({
    id: z.number(),
    level: z.number(),
    name: z.string(),
    element: z.string(),
    icon: z.string(),
    rarity: z.number(),
    rank: z.number(),
  })
  .passthrough();

export const BasicInfoSchema = z
  .object({
    nickname: z.string(),
    level: z.number(),
    region: z.string().optional(),
    avatar: z.string().optional(),
  })
  .passthrough();

export type ChronicleBasicInfo = z.infer<typeof BasicInfoSchema>;

export const IndexSchema = z
  .object({
    stats: z
      .object({
        active_days: z.number(),
        avatar_num: z.number(),
        achievement_num: z.number(),
        chest_num: z.number(),
        abyss_process: z.string(),
      })
      .passthrough(),
    avatar_list: z.array(AvatarSummarySchema).default([]),
  })
  .passthrough();

export type ChronicleIndex = z.infer<typeof IndexSchema>;

export const NotesSchema = z
  .object({
    current_stamina: z.number(),
    max_stamina: z.number(),
    stamina_recover_time: z.number(),
    accepted_epedition_num: z.number().default(0),
    total_expedition_num: z.number().default(0),
    current_train_score: z.number().default(0),
    max_train_score: z.number().default(0),
    current_rogue_score: z.number().default(0),
    max_rogue_score: z.number().default(0),
    weekly_cocoon_cnt: z.number().default(0),
    weekly_cocoon_limit: z.number().default(0),
  })
  .passthrough();

export type ChronicleNotes = z.infer<typeof NotesSchema>;

const EquipSchema = z
  .object({
    id: z.number(),
    level: z.number(),
    rank: z.number(),
    name: z.string(),
  })
  .passthrough();

const CharacterSchema = AvatarSummarySchema.extend({
  equip: EquipSchema.nullable().optional(),
  relics: z.array(z.object({ id: z.number(), level: z.number() }).passthrough()).default([]),
  ornaments: z.array(z.object({ id: z.number(), level: z.number() }).passthrough()).default([]),
}).passthrough();

export type ChronicleCharacter = z.infer<typeof CharacterSchema>;

export const CharactersSchema = z
  .object({
    avatar_list: z.array(CharacterSchema),
  })
  .passthrough();

export type ChronicleCharacters = z.infer<typeof CharactersSchema>;

const FinishTimeSchema = z
  .object({
    year: z.number(),
    month: z.number(),
    day: z.number(),
    hour: z.number(),
    minute: z.number(),
  })
  .passthrough();

const LineupMemberSchema = z
  .object({
    id: z.number(),
    level: z.number(),
    rarity: z.number(),
    element: z.string(),
    rank: z.number().default(0),
  })
  .passthrough();

const BlessingGroupSchema = z
  .object({
    base_type: z.object({ id: z.number(), name: z.string(), cnt: z.number() }).passthrough(),
    items: z.array(z.object({ id: z.number(), name: z.string() }).passthrough()).default([]),
  })
  .passthrough();

const CurioSchema = z.object({ id: z.number(), name: z.string() }).passthrough();

export const RogueRecordSchema = z
  .object({
    name: z.string(),
    finish_time: FinishTimeSchema,
    score: z.number().default(0),
    final_lineup: z.array(LineupMemberSchema).default([]),
    buffs: z.array(BlessingGroupSchema).default([]),
    miracles: z.array(CurioSchema).default([]),
    difficulty: z.number().default(0),
    progress: z.number().default(0),
  })
  .passthrough();

export type RogueRecord = z.infer<typeof RogueRecordSchema>;

const RoguePeriodSchema = z
  .object({
    basic: z
      .object({
        id: z.number(),
        finish_cnt: z.number(),
      })
      .passthrough(),
    records: z.array(RogueRecordSchema).default([]),
  })
  .passthrough();

export const SimulatedUniverseSchema = z
  .object({
    basic_info: z
      .object({
        unlocked_buff_num: z.number(),
        unlocked_miracle_num: z.number(),
        unlocked_skill_points: z.number(),
      })
      .passthrough(),
    current_record: RoguePeriodSchema,
    last_record: RoguePeriodSchema,
  })
  .passthrough();

export type SimulatedUniverse = z.infer<typeof SimulatedUniverseSchema>;

export const SwarmRecordSchema = z
  .object({
    name: z.string(),
    finish_time: FinishTimeSchema,
    final_lineup: z.array(LineupMemberSchema).default([]),
    miracles: z.array(CurioSchema).default([]),
    difficulty: z.number().default(0),
    fury: z.object({ type: z.number(), point: z.string() }).passthrough().optional(),
  })
  .passthrough();

export type SwarmRecord = z.infer<typeof SwarmRecordSchema>;

/** Path strider levels of the swarm overview */
const StriderSchema = z
  .object({
    id: z.number(),
    level: z.number(),
    desc: z.string().optional(),
  })
  .passthrough();

export type PathStrider = z.infer<typeof StriderSchema>;

export const SwarmDisasterSchema = z
  .object({
    basic: z
      .object({
        destiny: z.array(StriderSchema).default([]),
        cnt: z
          .object({
            narrow: z.number(),
            miracle: z.number(),
            event: z.number(),
          })
          .passthrough(),
      })
      .passthrough(),
    detail: z
      .object({
        records: z.array(SwarmRecordSchema).default([]),
      })
      .passthrough(),
  })
  .passthrough();

export type SwarmDisaster = z.infer<typeof SwarmDisasterSchema>;

const FloorNodeSchema = z
  .object({
    avatars: z.array(LineupMemberSchema).default([]),
  })
  .passthrough();

export const FloorSchema = z
  .object({
    name: z.string(),
    round_num: z.number(),
    star_num: z.number(),
    node_1: FloorNodeSchema,
    node_2: FloorNodeSchema,
  })
  .passthrough();

export type ChallengeFloor = z.infer<typeof FloorSchema>;

export const ForgottenHallSchema = z
  .object({
    schedule_id: z.number(),
    star_num: z.number(),
    max_floor: z.string(),
    battle_num: z.number(),
    has_data: z.boolean(),
    all_floor_detail: z.array(FloorSchema).default([]),
  })
  .passthrough();

export type ForgottenHall = z.infer<typeof ForgottenHallSchema>;
