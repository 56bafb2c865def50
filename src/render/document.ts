/**
 * Card document model
 *
 * Card builders turn upstream data into a CardDocument; a CardRenderer turns
 * the document into PNG bytes. Documents hold display strings only, so the
 * same document always renders to the same bytes.
 */

export interface CardLine {
  label: string;
  value: string;
}

export interface CardSection {
  heading: string;
  lines: CardLine[];
}

export interface CardDocument {
  title: string;
  subtitle: string;
  sections: CardSection[];
  /** Header color as 0xRRGGBBAA */
  accent?: number;
}

export const DEFAULT_ACCENT = 0x2d3a66ff;

export function line(label: string, value: string | number): CardLine {
  return { label, value: String(value) };
}

/**
 * Section that is left out of the card when it has no lines
 */
export function section(heading: string, lines: CardLine[]): CardSection[] {
  return lines.length > 0 ? [{ heading, lines }] : [];
}
