import {
  EncodingInvariantError,
  FIELD_NAME_RE,
  type FieldValue,
  type ProbeField,
  REDACTED,
} from '@edge-debug/shared';

/**
 * First of `base`, `base_2`, `base_3`, ... not yet in `taken`. Keys from
 * remote or host data may collapse to the same name after `toFieldName`.
 */
export function distinctName(base: string, taken: { has(name: string): boolean }): string {
  if (!taken.has(base)) return base;
  let n = 2;
  while (taken.has(`${base}_${n}`)) n += 1;
  return `${base}_${n}`;
}

/**
 * Turn an arbitrary key (interface name, GeoIP key) into a valid field
 * name segment.
 */
export function toFieldName(raw: string): string {
  const cleaned = raw
    .trim()
    .replace(/[^A-Za-z0-9_.-]+/g, '_')
    .replace(/^[.-]+/, '');
  return cleaned.length > 0 ? cleaned : '_';
}

/**
 * Builds the field list of a successful probe. Names must be unique;
 * sensitive values are masked here, before anything downstream sees them.
 */
export class FieldSet {
  private readonly fields = new Map<string, ProbeField>();

  add(name: string, value: FieldValue): this {
    return this.put(name, value, false);
  }

  /** Add a field whose value must never leave the host */
  addSensitive(name: string, _value: FieldValue, mask: string = REDACTED): this {
    return this.put(name, mask, true);
  }

  /** Add a value the probe has already partly masked */
  addMasked(name: string, value: FieldValue): this {
    return this.put(name, value, true);
  }

  /**
   * Add under a name derived from external data, suffixing it when an
   * earlier key collapsed to the same name.
   */
  addDistinct(name: string, value: FieldValue): this {
    return this.add(distinctName(name, this.fields), value);
  }

  /** Add a field only when a value is present */
  addOptional(name: string, value: FieldValue | null | undefined): this {
    if (value === null || value === undefined) return this;
    return this.add(name, value);
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  toFields(): ProbeField[] {
    return [...this.fields.values()];
  }

  private put(name: string, value: FieldValue, redacted: boolean): this {
    if (!FIELD_NAME_RE.test(name)) {
      throw new EncodingInvariantError(`Invalid field name: "${name}"`);
    }
    if (this.fields.has(name)) {
      throw new EncodingInvariantError(`Duplicate field name: "${name}"`);
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new EncodingInvariantError(`Field "${name}" is not a finite number`);
    }
    this.fields.set(name, { name, value, redacted });
    return this;
  }
}
