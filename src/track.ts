/**
 * @rwtf/core — TrackReader (consumer)
 *
 * Read-only lens onto an encoded track. Construction decodes and validates
 * the whole buffer in order:
 *
 *   header → metadata table → data table (structure, then bodies)
 *
 * The tables must sit back to back with nothing after them, the layout
 * writeTrack() produces:
 *
 *   [header][metadata table][data table]<end of buffer>
 *
 * The first failure throws and no reader is returned, so a TrackReader that
 * exists is always fully valid. Errors are the codec errors from errors.ts,
 * unchanged.
 *
 * Absent values are null everywhere in this API.
 */

import { HEADER_SIZE, OFFSET_DATA_TABLE_OFFSET, OFFSET_METADATA_TABLE_OFFSET } from './constants';
import { readDataTable, type ReadOptions } from './data-table';
import { NonCanonicalError } from './errors';
import { readHeader } from './header';
import { readMetadataTable } from './metadata';
import type {
  Column,
  FieldValue,
  MetadataEntry,
  Schema,
  Section,
  TrackContent,
  TrackHeader,
  TrackType,
} from './types';
import { writeTrack } from './writer';

/** One point of a section: field name → value, or null where absent. */
export type TrackPoint = Readonly<Record<string, FieldValue | null>>;

// ─── SectionView ──────────────────────────────────────────────────────────────

export class SectionView {
  private readonly columnIndex: ReadonlyMap<string, Column>;

  /** @internal Use TrackReader.section(). */
  constructor(
    readonly section: Section,
    readonly index:   number,
  ) {
    this.columnIndex = new Map(section.columns.map(c => [c.name, c]));
  }

  get pointCount(): number {
    return this.section.pointCount;
  }

  get schema(): Schema {
    return this.section.schema;
  }

  /** Names of the decoded columns, in schema order. */
  get fieldNames(): readonly string[] {
    return this.section.columns.map(c => c.name);
  }

  /** The decoded column, or undefined if the field is unknown or was projected out. */
  column(name: string): Column | undefined {
    return this.columnIndex.get(name);
  }

  /**
   * Value of `name` at `point`, or null where the field is absent.
   *
   * @throws RangeError if `point` is out of range or `name` is not a decoded column
   */
  value(point: number, name: string): FieldValue | null {
    this.checkPoint(point);
    const column = this.columnIndex.get(name);
    if (column === undefined) {
      throw new RangeError(
        `Section ${this.index} has no decoded column '${name}'. ` +
        `Decoded columns: [${this.fieldNames.join(', ')}].`,
      );
    }
    return column.values[point] ?? null;
  }

  /** Every decoded field at `point`. */
  point(point: number): TrackPoint {
    this.checkPoint(point);
    const record: Record<string, FieldValue | null> = {};
    for (const column of this.section.columns) {
      record[column.name] = column.values[point] ?? null;
    }
    return Object.freeze(record);
  }

  *points(): IterableIterator<TrackPoint> {
    for (let p = 0; p < this.section.pointCount; p++) yield this.point(p);
  }

  private checkPoint(point: number): void {
    if (!Number.isInteger(point) || point < 0 || point >= this.section.pointCount) {
      throw new RangeError(
        `Point ${point} is out of range for section ${this.index} (${this.section.pointCount} points).`,
      );
    }
  }
}

// ─── TrackReader ──────────────────────────────────────────────────────────────

export class TrackReader {
  readonly header: TrackHeader;

  private readonly _metadata: readonly MetadataEntry[];
  private readonly _sections: readonly SectionView[];
  private readonly projected: boolean;

  /**
   * @param bytes    A complete encoded track.
   * @param options  `fields` restricts which columns are decoded.
   */
  constructor(bytes: Uint8Array, options: ReadOptions = {}) {
    this.header = readHeader(bytes);
    const { metadataTableOffset, dataTableOffset } = this.header;

    if (metadataTableOffset !== HEADER_SIZE) {
      throw new NonCanonicalError(
        OFFSET_METADATA_TABLE_OFFSET, 'layout',
        `metadata table at ${metadataTableOffset}; it must start right after the header, at ${HEADER_SIZE}`,
      );
    }
    if (dataTableOffset <= metadataTableOffset) {
      throw new NonCanonicalError(
        OFFSET_DATA_TABLE_OFFSET, 'layout',
        `data table at ${dataTableOffset} does not follow the metadata table at ${metadataTableOffset}`,
      );
    }

    const metadata = readMetadataTable(bytes, metadataTableOffset, dataTableOffset);
    if (metadata.nextOffset !== dataTableOffset) {
      throw new NonCanonicalError(
        metadata.nextOffset, 'layout',
        `${dataTableOffset - metadata.nextOffset} byte(s) between the metadata table and the data table`,
      );
    }

    const data = readDataTable(bytes, dataTableOffset, options);
    if (data.nextOffset !== bytes.length) {
      throw new NonCanonicalError(
        data.nextOffset, 'layout',
        `${bytes.length - data.nextOffset} byte(s) after the data table`,
      );
    }

    this._metadata = metadata.entries;
    this._sections = Object.freeze(data.sections.map((s, i) => new SectionView(s, i)));
    this.projected = options.fields !== undefined;
  }

  fileVersion(): number {
    return this.header.fileVersion;
  }

  creatorVersion(): number {
    return this.header.creatorVersion;
  }

  metadata(): readonly MetadataEntry[] {
    return this._metadata;
  }

  /** The first track_type entry, or null if the track has none. */
  trackType(): { value: TrackType; segmentId: number } | null {
    for (const entry of this._metadata) {
      if (entry.kind === 'track_type') return { value: entry.value, segmentId: entry.segmentId };
    }
    return null;
  }

  get sectionCount(): number {
    return this._sections.length;
  }

  /** @throws RangeError if `index` is out of range */
  section(index: number): SectionView {
    const view = this._sections[index];
    if (view === undefined) {
      throw new RangeError(`Section ${index} is out of range (${this._sections.length} sections).`);
    }
    return view;
  }

  sections(): readonly SectionView[] {
    return this._sections;
  }

  /** The decoded track as plain content, ready for writeTrack(). */
  content(): TrackContent {
    return {
      creatorVersion: this.header.creatorVersion,
      metadata:       this._metadata,
      sections:       this._sections.map(v => v.section),
    };
  }

  /**
   * Re-encode the track. The result equals the bytes it was read from.
   *
   * @throws TypeError if the track was read with a field projection
   */
  toBytes(): Uint8Array {
    if (this.projected) {
      throw new TypeError('A track read with a field projection cannot be re-encoded.');
    }
    return writeTrack(this.content());
  }
}

/** Decode and validate a track. Equivalent to `new TrackReader(bytes, options)`. */
export function readTrack(bytes: Uint8Array, options: ReadOptions = {}): TrackReader {
  return new TrackReader(bytes, options);
}
