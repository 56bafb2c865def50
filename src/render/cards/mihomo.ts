/**
 * Card builders for Mihomo player snapshots
 */

import type { Language } from '../../i18n/languages.js';
import type { Translator } from '../../i18n/translator.js';
import type { MihomoCharacter, MihomoPlayer } from '../../upstream/mihomo/models.js';
import { line, section, type CardDocument } from '../document.js';

/** Header colors by element id, 0xRRGGBBAA */
const ELEMENT_ACCENTS: Record<string, number> = {
  Fire: 0xb3412dff,
  Ice: 0x3d7fb3ff,
  Imaginary: 0xb39b2dff,
  Physical: 0x6b6b6bff,
  Quantum: 0x4a3db3ff,
  Thunder: 0x7d3db3ff,
  Wind: 0x2d9b6bff,
};

export function buildCharacterCard(
  player: MihomoPlayer,
  character: MihomoCharacter,
  detailed: boolean,
  t: Translator,
  lang: Language
): CardDocument {
  const lightCone = character.light_cone;

  const sections = [
    ...section(character.name, [
      line(t.t('common.level', lang), `${character.level}/${(character.promotion + 2) * 10}`),
      line(t.t('mihomo.eidolon', lang), t.numeral(character.rank, lang)),
      line(character.path.name, character.element.name),
    ]),
    ...section(
      t.t('mihomo.light_cone', lang),
      lightCone
        ? [line(lightCone.name, `${t.t('common.level', lang)} ${lightCone.level} | S${lightCone.rank}`)]
        : []
    ),
    ...section(
      character.name,
      character.skills.map((skill) => line(skill.type_text ?? skill.name, `${skill.level}/${skill.max_level}`))
    ),
  ];

  if (detailed) {
    const stats = new Map<string, string>();
    for (const attribute of character.attributes) {
      stats.set(attribute.name, attribute.display);
    }
    for (const addition of character.additions) {
      const base = stats.get(addition.name);
      stats.set(addition.name, base ? `${base} + ${addition.display}` : addition.display);
    }

    sections.push(
      ...section(
        t.t('mihomo.stats', lang),
        Array.from(stats, ([name, value]) => line(name, value))
      ),
      ...section(
        t.t('mihomo.relics', lang),
        character.relics.map((relic) =>
          line(
            `${relic.set_name} +${relic.level}`,
            [relic.main_affix, ...relic.sub_affix].map((affix) => `${affix.name} ${affix.display}`).join(', ')
          )
        )
      )
    );
  }

  return {
    title: `${character.name} - ${player.player.nickname}`,
    subtitle: `${t.t('mihomo.title', lang)} | ${t.t('common.uid', lang, { uid: player.player.uid })}`,
    sections,
    accent: ELEMENT_ACCENTS[character.element.id],
  };
}

export function buildPlayerCard(player: MihomoPlayer, t: Translator, lang: Language): CardDocument {
  const info = player.player;

  return {
    title: `${info.nickname} - ${t.t('common.level', lang)} ${info.level}`,
    subtitle: `${t.t('mihomo.player', lang)} | ${t.t('common.uid', lang, { uid: info.uid })}`,
    sections: [
      ...section(t.t('mihomo.player', lang), [
        line(t.t('mihomo.world_level', lang), info.world_level),
        line(t.t('mihomo.friends', lang), info.friend_count),
        line(t.t('mihomo.achievements', lang), info.space_info?.achievement_count ?? 0),
        line(t.t('mihomo.signature', lang), info.signature || '-'),
      ]),
      ...section(
        t.t('mihomo.characters', lang),
        player.characters.map((character, i) =>
          line(
            `#${i + 1} ${character.name}`,
            t.t('characters.entry', lang, { level: character.level, rank: character.rank })
          )
        )
      ),
    ],
  };
}
