/**
 * Mihomo fetch steps
 */

import type { Language } from '../i18n/languages.js';
import type { MihomoClient } from '../upstream/mihomo/client.js';
import type { MihomoCharacter, MihomoPlayer } from '../upstream/mihomo/models.js';
import { ErrorCode } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';
import { invalidParameter, upstreamFailure, type GenerationFailure } from './failures.js';

/**
 * A player to render: the snapshot held by a token, or a UID to look up
 */
export interface MihomoSubject {
  uid: number;
  snapshot: MihomoPlayer | null;
}

export async function fetchPlayer(
  client: MihomoClient,
  subject: MihomoSubject,
  lang: Language
): Promise<Result<MihomoPlayer, GenerationFailure>> {
  if (subject.snapshot) {
    return ok(subject.snapshot);
  }

  const player = await client.getPlayer(subject.uid, lang);
  if (!player.ok) return err(upstreamFailure('mihomo', player.error));
  return ok(player.value);
}

/**
 * Pick a displayed character by its 1-based slot
 */
export function selectCharacter(
  player: MihomoPlayer,
  slot: number
): Result<MihomoCharacter, GenerationFailure> {
  const character = player.characters[slot - 1];
  if (!character) {
    return err(
      invalidParameter(
        ErrorCode.MIHOMO_INVALID_CHARACTER,
        `Character ${slot} is not on display, ${player.characters.length} available`
      )
    );
  }
  return ok(character);
}
