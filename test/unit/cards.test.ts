/**
 * Card Builder Tests
 */

import { describe, expect, it } from 'vitest';
import { Translator } from '../../src/i18n/translator.js';
import {
  buildCharactersCard,
  buildForgottenHallCard,
  buildOverviewCard,
  buildSimulatedUniverseCard,
  buildSwarmDisasterCard,
  formatFinishTime,
} from '../../src/render/cards/hoyolab.js';
import { buildCharacterCard, buildPlayerCard } from '../../src/render/cards/mihomo.js';
import type { MihomoCharacter } from '../../src/upstream/mihomo/models.js';
import {
  basicInfo,
  characters,
  chronicleIndex,
  forgottenHall,
  mihomoPlayer,
  notes,
  rogueRecord,
  swarmDisaster,
} from '../fixtures.js';

const t = Translator.fromDirectory();
const UID = 800000001;

describe('HoYoLAB cards', () => {
  it('should format finish times with padded fields', () => {
    expect(formatFinishTime({ year: 2024, month: 3, day: 9, hour: 7, minute: 5 })).toBe('2024-03-09 07:05');
  });

  it('should build the overview with notes', () => {
    const card = buildOverviewCard({ basicInfo, index: chronicleIndex, notes }, UID, t, 'en-US');

    expect(card.title).toBe('Trailblazer - Level 70');
    expect(card.subtitle).toBe('Battle Chronicles | UID 800000001');
    expect(card.sections).toEqual([
      {
        heading: 'Overview',
        lines: [
          { label: 'Days Active', value: '420' },
          { label: 'Characters Unlocked', value: '38' },
          { label: 'Achievements', value: '512' },
          { label: 'Chests Opened', value: '1890' },
          { label: 'Memory of Chaos', value: 'Stage 12 completed' },
        ],
      },
      {
        heading: 'Real-Time Notes',
        lines: [
          { label: 'Trailblaze Power', value: '120/240 (8h 00m)' },
          { label: 'Assignments', value: '4/4' },
          { label: 'Daily Training', value: '500/500' },
          { label: 'Simulated Universe Points', value: '9000/14000' },
          { label: 'Echo of War', value: '1/3' },
        ],
      },
    ]);
  });

  it('should sort characters by rarity, then level', () => {
    const card = buildCharactersCard(characters, UID, t, 'en-US');

    expect(card.sections).toHaveLength(1);
    expect(card.sections[0]?.heading).toBe('Characters (3)');
    expect(card.sections[0]?.lines).toEqual([
      { label: 'Seele (5*)', value: 'Lv. 80 | E0' },
      { label: 'March 7th (4*)', value: 'Lv. 80 | E6' },
      { label: 'Dan Heng (4*)', value: 'Lv. 70 | E2' },
    ]);
  });

  it('should describe a simulated universe run', () => {
    const card = buildSimulatedUniverseCard(rogueRecord('World 9 - latest'), 1, UID, t, 'en-US');

    expect(card.title).toBe('Simulated Universe - World 9 - latest');
    expect(card.subtitle).toBe('Run 1 | UID 800000001');
    expect(card.sections).toEqual([
      {
        heading: 'Simulated Universe',
        lines: [
          { label: 'Finished', value: '2024-03-09 07:05' },
          { label: 'Score', value: '1200' },
          { label: 'Difficulty V', value: '6' },
        ],
      },
      { heading: 'Lineup', lines: [{ label: '#1', value: '1102 Lv. 80 | E0' }] },
      { heading: 'Blessings', lines: [{ label: 'Preservation', value: '7' }] },
      { heading: 'Curios', lines: [{ label: '#1', value: 'Dimension Reduction Dice' }] },
    ]);
  });

  it('should describe a swarm run with its difficulty once and the path striders', () => {
    const run = swarmDisaster.detail.records[0];
    if (!run) throw new Error('fixture has a swarm run');
    const record = { ...run, fury: { type: 1, point: '80' } };

    const card = buildSwarmDisasterCard(record, swarmDisaster.basic.destiny, 1, UID, t, 'en-US');

    expect(card.title).toBe('Swarm Disaster - Swarm run');
    expect(card.subtitle).toBe('Run 1 | UID 800000001');
    expect(card.sections).toEqual([
      {
        heading: 'Swarm Disaster',
        lines: [
          { label: 'Finished', value: '2024-04-01 22:30' },
          { label: 'Difficulty', value: 'II' },
          { label: 'Swarm Fury', value: '80' },
        ],
      },
      {
        heading: 'Path Striders',
        lines: [
          { label: 'Preservation', value: 'Level 3' },
          { label: '#4', value: 'Level 1' },
        ],
      },
    ]);
  });

  it('should leave the fury row out when the run has none', () => {
    const run = swarmDisaster.detail.records[0];
    if (!run) throw new Error('fixture has a swarm run');

    const card = buildSwarmDisasterCard(run, [], 1, UID, t, 'en-US');

    expect(card.sections).toEqual([
      {
        heading: 'Swarm Disaster',
        lines: [
          { label: 'Finished', value: '2024-04-01 22:30' },
          { label: 'Difficulty', value: 'II' },
        ],
      },
    ]);
  });

  it('should name the requested floor', () => {
    const floor = forgottenHall.all_floor_detail[2];
    if (!floor) throw new Error('fixture has three floors');

    const card = buildForgottenHallCard(floor, 1, UID, t, 'en-US');

    expect(card.title).toBe('Memory of Chaos - Floor I');
    expect(card.subtitle).toBe('Floor 1 | UID 800000001');
    expect(card.sections).toEqual([
      {
        heading: 'Memory of Chaos',
        lines: [
          { label: 'Stars', value: '3' },
          { label: 'Cycles Used', value: '5' },
        ],
      },
    ]);
  });

  it('should fall back to English for missing translations', () => {
    const card = buildCharactersCard(characters, UID, t, 'de-DE');

    expect(card.title).toBe('Characters');
  });
});

describe('Mihomo cards', () => {
  const seele = mihomoPlayer.characters[0];
  if (!seele) throw new Error('fixture has one character');

  const withStats: MihomoCharacter = {
    ...seele,
    attributes: [{ field: 'hp', name: 'HP', value: 1000, display: '1000', percent: false }],
    additions: [
      { field: 'hp', name: 'HP', value: 200, display: '200', percent: false },
      { field: 'crit_rate', name: 'CRIT Rate', value: 0.05, display: '5.0%', percent: true },
    ],
  };

  it('should build a character card colored by element', () => {
    const card = buildCharacterCard(mihomoPlayer, withStats, false, t, 'en-US');

    expect(card.title).toBe('Seele - Stelle');
    expect(card.subtitle).toBe('Character Card | UID 800000001');
    expect(card.accent).toBe(0x4a3db3ff);
    expect(card.sections).toEqual([
      {
        heading: 'Seele',
        lines: [
          { label: 'Level', value: '80/80' },
          { label: 'Eidolon', value: '0' },
          { label: 'The Hunt', value: 'Quantum' },
        ],
      },
    ]);
  });

  it('should add combined stats to a detailed card', () => {
    const card = buildCharacterCard(mihomoPlayer, withStats, true, t, 'en-US');

    expect(card.sections[1]).toEqual({
      heading: 'Stats',
      lines: [
        { label: 'HP', value: '1000 + 200' },
        { label: 'CRIT Rate', value: '5.0%' },
      ],
    });
  });

  it('should list displayed characters on the player card', () => {
    const card = buildPlayerCard(mihomoPlayer, t, 'en-US');

    expect(card.title).toBe('Stelle - Level 70');
    expect(card.subtitle).toBe('Trailblazer Profile | UID 800000001');
    expect(card.sections).toEqual([
      {
        heading: 'Trailblazer Profile',
        lines: [
          { label: 'Equilibrium Level', value: '6' },
          { label: 'Friends', value: '12' },
          { label: 'Achievements', value: '0' },
          { label: 'Signature', value: 'hello' },
        ],
      },
      { heading: 'Characters', lines: [{ label: '#1 Seele', value: 'Lv. 80 | E0' }] },
    ]);
  });
});
