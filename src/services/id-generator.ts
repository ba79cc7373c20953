// ID Generator Service for record stores

/**
 * Generates time-derived record IDs of the form {prefix}-{YYYYMMDDTHHmmssSSSZ}-{NNNN}.
 * IDs from one generator never repeat and sort in generation order, even when
 * the supplied time stands still or moves backwards.
 */
export class IdGenerator {
  private lastMillis = Number.NEGATIVE_INFINITY;
  private sequence = 0;

  /**
   * Generates the next unique ID
   * @param prefix - Store-specific prefix (e.g. "hist", "plan")
   * @param at - Creation time the ID is derived from
   */
  generateId(prefix: string, at: Date = new Date()): string {
    let millis = at.getTime();

    if (millis <= this.lastMillis) {
      millis = this.lastMillis;
      this.sequence++;
    } else {
      this.lastMillis = millis;
      this.sequence = 0;
    }

    const stamp = new Date(millis).toISOString().replace(/[-:.]/g, '');
    return `${prefix}-${stamp}-${this.sequence.toString().padStart(4, '0')}`;
  }
}

// One generator per process, shared by every store
export const defaultIdGenerator = new IdGenerator();
