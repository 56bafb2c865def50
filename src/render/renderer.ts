/**
 * Card Renderer - CardDocument to PNG
 *
 * Layout is a fixed-width column: a colored header with title and
 * subtitle, then one block per section with a label/value row per line.
 * Fonts are loaded once and kept until clear().
 */

import { Jimp, loadFont } from 'jimp';
import { SANS_16_BLACK, SANS_16_WHITE, SANS_32_WHITE } from 'jimp/fonts';
import { DEFAULT_ACCENT, type CardDocument } from './document.js';

export interface CardRenderer {
  render(document: CardDocument): Promise<Buffer>;
  /** Drop cached resources */
  clear(): void;
}

type Font = Awaited<ReturnType<typeof loadFont>>;

interface FontSet {
  title: Font;
  subtitle: Font;
  body: Font;
}

export const CARD_WIDTH = 800;
const PADDING = 24;
const HEADER_HEIGHT = 104;
const HEADING_HEIGHT = 36;
const LINE_HEIGHT = 26;
const SECTION_GAP = 12;
const VALUE_COLUMN = 360;
const BACKGROUND = 0xf4f5f9ff;
const DIVIDER = 0xc8ccd8ff;

/**
 * Bundled bitmap fonts cover printable ASCII; anything else prints as '?'
 */
export function toPrintable(text: string): string {
  return text.replace(/[^\x20-\x7e]/g, '?');
}

/**
 * Pixel height of a rendered document
 */
export function cardHeight(document: CardDocument): number {
  let height = HEADER_HEIGHT + PADDING;
  for (const section of document.sections) {
    height += HEADING_HEIGHT + section.lines.length * LINE_HEIGHT + SECTION_GAP;
  }
  return height + PADDING;
}

export class JimpCardRenderer implements CardRenderer {
  private fonts: Promise<FontSet> | null = null;

  async render(document: CardDocument): Promise<Buffer> {
    const fonts = await this.loadFonts();
    const image = new Jimp({ width: CARD_WIDTH, height: cardHeight(document), color: BACKGROUND });

    image.composite(
      new Jimp({ width: CARD_WIDTH, height: HEADER_HEIGHT, color: document.accent ?? DEFAULT_ACCENT }),
      0,
      0
    );
    image.print({ font: fonts.title, x: PADDING, y: 18, text: toPrintable(document.title) });
    image.print({ font: fonts.subtitle, x: PADDING, y: 66, text: toPrintable(document.subtitle) });

    let y = HEADER_HEIGHT + PADDING;
    for (const section of document.sections) {
      image.print({ font: fonts.body, x: PADDING, y: y + 4, text: toPrintable(section.heading) });
      image.composite(new Jimp({ width: CARD_WIDTH - PADDING * 2, height: 2, color: DIVIDER }), PADDING, y + 28);
      y += HEADING_HEIGHT;

      for (const row of section.lines) {
        image.print({
          font: fonts.body,
          x: PADDING,
          y,
          text: toPrintable(row.label),
          maxWidth: VALUE_COLUMN - PADDING * 2,
        });
        image.print({
          font: fonts.body,
          x: VALUE_COLUMN,
          y,
          text: toPrintable(row.value),
          maxWidth: CARD_WIDTH - VALUE_COLUMN - PADDING,
        });
        y += LINE_HEIGHT;
      }

      y += SECTION_GAP;
    }

    return image.getBuffer('image/png');
  }

  clear(): void {
    this.fonts = null;
  }

  private loadFonts(): Promise<FontSet> {
    if (!this.fonts) {
      const loading = Promise.all([loadFont(SANS_32_WHITE), loadFont(SANS_16_WHITE), loadFont(SANS_16_BLACK)]).then(
        ([title, subtitle, body]) => ({ title, subtitle, body })
      );
      // A failed load is retried on the next render
      loading.catch(() => {
        if (this.fonts === loading) {
          this.fonts = null;
        }
      });
      this.fonts = loading;
    }
    return this.fonts;
  }
}
