const FIELD_DELIMITER = "|";
const INTEGER_PATTERN = /^[+-]?\d+$/;

export interface AnnotatorOptions {
  timestampMarker?: string;
  ageMarker?: string;
}

export interface AnnotatedRecord {
  line: string;
  timestamp?: number;
  ageMs?: number;
}

/**
 * Appends the device-clock age since the previous timestamped record.
 * Out-of-order timestamps still replace the previous value, so an age can be
 * zero or negative.
 */
export class TimestampAnnotator {
  private previousTimestamp: number | undefined;
  private readonly prefix: string;
  private readonly ageMarker: string;

  constructor(options: AnnotatorOptions = {}) {
    this.prefix = `${options.timestampMarker ?? "TS"}:`;
    this.ageMarker = options.ageMarker ?? "AGE";
  }

  get lastTimestamp(): number | undefined {
    return this.previousTimestamp;
  }

  annotate(line: string): AnnotatedRecord {
    const timestamp = this.extractTimestamp(line);
    if (timestamp === undefined) {
      return { line };
    }

    const ageMs = this.previousTimestamp === undefined ? 0 : timestamp - this.previousTimestamp;
    this.previousTimestamp = timestamp;
    return {
      line: `${line} ${FIELD_DELIMITER} ${this.ageMarker}:${String(ageMs)}ms`,
      timestamp,
      ageMs
    };
  }

  private extractTimestamp(line: string): number | undefined {
    const field = line
      .split(FIELD_DELIMITER)
      .map((part) => part.trim())
      .find((part) => part.startsWith(this.prefix));
    if (field === undefined) return undefined;

    const raw = field.slice(this.prefix.length).trim();
    if (!INTEGER_PATTERN.test(raw)) return undefined;
    const value = Number(raw);
    return Number.isSafeInteger(value) ? value : undefined;
  }
}
