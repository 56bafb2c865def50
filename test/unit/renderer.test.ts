/**
 * Card Renderer Tests
 *
 * Renders with the bundled bitmap fonts and reads the PNG header back.
 */

import { describe, expect, it } from 'vitest';
import type { CardDocument } from '../../src/render/document.js';
import { CARD_WIDTH, JimpCardRenderer, cardHeight, toPrintable } from '../../src/render/renderer.js';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

const document: CardDocument = {
  title: 'Trailblazer - Level 70',
  subtitle: 'Battle Chronicles | UID 800000001',
  sections: [
    {
      heading: 'Overview',
      lines: [
        { label: 'Days Active', value: '420' },
        { label: 'Achievements', value: '512' },
      ],
    },
  ],
};

describe('toPrintable', () => {
  it('should keep printable ASCII', () => {
    expect(toPrintable('Lv. 80 | E6')).toBe('Lv. 80 | E6');
  });

  it('should replace characters the fonts cannot draw', () => {
    expect(toPrintable('Käthe 5★')).toBe('K?the 5?');
  });
});

describe('cardHeight', () => {
  it('should grow with sections and lines', () => {
    expect(cardHeight({ ...document, sections: [] })).toBe(152);
    expect(cardHeight(document)).toBe(252);
  });
});

describe('JimpCardRenderer', () => {
  it('should render a PNG of the card size', async () => {
    const renderer = new JimpCardRenderer();

    const png = await renderer.render(document);

    expect([...png.subarray(0, 8)]).toEqual(PNG_SIGNATURE);
    expect(png.readUInt32BE(16)).toBe(CARD_WIDTH);
    expect(png.readUInt32BE(20)).toBe(252);
  });

  it('should render the same document to the same bytes', async () => {
    const renderer = new JimpCardRenderer();

    const first = await renderer.render(document);
    renderer.clear();
    const second = await renderer.render(document);

    expect(second.equals(first)).toBe(true);
  });
});
