/**
 * Card builders for HoYoLAB battle chronicle data
 */

import type { Language } from '../../i18n/languages.js';
import type { Translator } from '../../i18n/translator.js';
import type {
  ChallengeFloor,
  ChronicleBasicInfo,
  ChronicleCharacters,
  ChronicleIndex,
  ChronicleNotes,
  PathStrider,
  RogueRecord,
  SwarmRecord,
} from '../../upstream/hoyolab/models.js';
import { line, section, type CardDocument, type CardLine } from '../document.js';

export interface OverviewInput {
  basicInfo: ChronicleBasicInfo;
  index: ChronicleIndex;
  notes: ChronicleNotes;
}

interface FinishTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

const pad = (n: number): string => String(n).padStart(2, '0');

export function formatFinishTime(time: FinishTime): string {
  return `${time.year}-${pad(time.month)}-${pad(time.day)} ${pad(time.hour)}:${pad(time.minute)}`;
}

function formatRecovery(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${pad(minutes)}m`;
}

function lineupLines(members: Array<{ id: number; level: number; rank: number }>, t: Translator, lang: Language): CardLine[] {
  return members.map((member, i) =>
    line(`#${i + 1}`, `${member.id} ${t.t('characters.entry', lang, { level: member.level, rank: member.rank })}`)
  );
}

export function buildOverviewCard(input: OverviewInput, uid: number, t: Translator, lang: Language): CardDocument {
  const { basicInfo, index, notes } = input;
  const stats = index.stats;

  const noteLines: CardLine[] = [
    line(
      t.t('chronicles.stamina', lang),
      `${notes.current_stamina}/${notes.max_stamina} (${formatRecovery(notes.stamina_recover_time)})`
    ),
    line(t.t('chronicles.expeditions', lang), `${notes.accepted_epedition_num}/${notes.total_expedition_num}`),
    line(t.t('chronicles.training', lang), `${notes.current_train_score}/${notes.max_train_score}`),
    line(t.t('chronicles.rogue_score', lang), `${notes.current_rogue_score}/${notes.max_rogue_score}`),
    line(t.t('chronicles.echo_of_war', lang), `${notes.weekly_cocoon_cnt}/${notes.weekly_cocoon_limit}`),
  ];

  return {
    title: `${basicInfo.nickname} - ${t.t('common.level', lang)} ${basicInfo.level}`,
    subtitle: `${t.t('chronicles.title', lang)} | ${t.t('common.uid', lang, { uid })}`,
    sections: [
      ...section(t.t('chronicles.summary', lang), [
        line(t.t('chronicles.active_days', lang), stats.active_days),
        line(t.t('chronicles.avatars', lang), stats.avatar_num),
        line(t.t('chronicles.achievements', lang), stats.achievement_num),
        line(t.t('chronicles.chests', lang), stats.chest_num),
        line(t.t('chronicles.moc', lang), stats.abyss_process),
      ]),
      ...section(t.t('chronicles.notes', lang), noteLines),
    ],
  };
}

export function buildCharactersCard(
  characters: ChronicleCharacters,
  uid: number,
  t: Translator,
  lang: Language
): CardDocument {
  const sorted = [...characters.avatar_list].sort(
    (a, b) => b.rarity - a.rarity || b.level - a.level || a.id - b.id
  );

  return {
    title: t.t('characters.title', lang),
    subtitle: t.t('common.uid', lang, { uid }),
    sections: section(
      `${t.t('characters.title', lang)} (${sorted.length})`,
      sorted.map((character) =>
        line(
          `${character.name} (${character.rarity}*)`,
          t.t('characters.entry', lang, { level: character.level, rank: character.rank })
        )
      )
    ),
  };
}

export function buildSimulatedUniverseCard(
  record: RogueRecord,
  index: number,
  uid: number,
  t: Translator,
  lang: Language
): CardDocument {
  return {
    title: `${t.t('simuniverse.title', lang)} - ${record.name}`,
    subtitle: `${t.t('simuniverse.record', lang, { index })} | ${t.t('common.uid', lang, { uid })}`,
    sections: [
      ...section(t.t('simuniverse.title', lang), [
        line(t.t('simuniverse.finished_at', lang), formatFinishTime(record.finish_time)),
        line(t.t('simuniverse.score', lang), record.score),
        line(t.t('simuniverse.difficulty', lang, { difficulty: t.numeral(record.difficulty, lang) }), record.progress),
      ]),
      ...section(t.t('simuniverse.lineup', lang), lineupLines(record.final_lineup, t, lang)),
      ...section(
        t.t('simuniverse.blessings', lang),
        record.buffs.map((group) => line(group.base_type.name, group.base_type.cnt))
      ),
      ...section(
        t.t('simuniverse.curios', lang),
        record.miracles.map((curio, i) => line(`#${i + 1}`, curio.name))
      ),
    ],
  };
}

export function buildSwarmDisasterCard(
  record: SwarmRecord,
  striders: PathStrider[],
  index: number,
  uid: number,
  t: Translator,
  lang: Language
): CardDocument {
  return {
    title: `${t.t('simuniverse.swarm', lang)} - ${record.name}`,
    subtitle: `${t.t('simuniverse.record', lang, { index })} | ${t.t('common.uid', lang, { uid })}`,
    sections: [
      ...section(t.t('simuniverse.swarm', lang), [
        line(t.t('simuniverse.finished_at', lang), formatFinishTime(record.finish_time)),
        line(t.t('simuniverse.difficulty_level', lang), t.numeral(record.difficulty, lang)),
        ...(record.fury ? [line(t.t('simuniverse.fury', lang), record.fury.point)] : []),
      ]),
      ...section(t.t('simuniverse.lineup', lang), lineupLines(record.final_lineup, t, lang)),
      ...section(
        t.t('simuniverse.curios', lang),
        record.miracles.map((curio, i) => line(`#${i + 1}`, curio.name))
      ),
      ...section(
        t.t('simuniverse.striders', lang),
        striders.map((strider) =>
          line(strider.desc || `#${strider.id}`, `${t.t('common.level', lang)} ${strider.level}`)
        )
      ),
    ],
  };
}

export function buildForgottenHallCard(
  floor: ChallengeFloor,
  requestedFloor: number,
  uid: number,
  t: Translator,
  lang: Language
): CardDocument {
  return {
    title: `${t.t('moc.title', lang)} - ${floor.name}`,
    subtitle: `${t.t('moc.floor', lang, { floor: requestedFloor })} | ${t.t('common.uid', lang, { uid })}`,
    sections: [
      ...section(t.t('moc.title', lang), [
        line(t.t('moc.stars', lang), floor.star_num),
        line(t.t('moc.rounds', lang), floor.round_num),
      ]),
      ...section(t.t('moc.node_1', lang), lineupLines(floor.node_1.avatars, t, lang)),
      ...section(t.t('moc.node_2', lang), lineupLines(floor.node_2.avatars, t, lang)),
    ],
  };
}
