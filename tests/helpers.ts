import { readFileSync } from 'node:fs';

/** Parse whitespace-separated hex bytes. '#' comments run to end of line. */
export function hex(text: string): Uint8Array {
  const tokens = text
    .split('\n')
    .flatMap(line => (line.split('#')[0] ?? '').split(/\s+/))
    .filter(t => t.length > 0);
  return Uint8Array.from(tokens, t => parseInt(t, 16));
}

/** Load a fixture from tests/fixtures/. */
export function loadFixture(name: string): Uint8Array {
  return hex(readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8'));
}

/** A copy of `bytes` with the byte at `offset` inverted. */
export function flip(bytes: Uint8Array, offset: number): Uint8Array {
  const copy = bytes.slice();
  copy[offset] = (copy[offset] ?? 0) ^ 0xff;
  return copy;
}

export const TWO_SECTIONS = loadFixture('two-sections.hex');

/** Byte ranges of the blocks in two-sections.hex, [start, end). */
export const FIXTURE_BLOCKS = {
  header:           [0, 24],
  metadataTable:    [24, 35],
  dataTable:        [35, 72],
  section0:         [72, 123],
  section0Presence: [72, 81],
  section0M:        [81, 90],
  section0K:        [90, 99],
  section0J:        [99, 123],
  section1:         [123, 161],
  section1Presence: [123, 130],
  section1A:        [130, 137],
  section1B:        [137, 143],
  section1C:        [143, 161],
} as const;
