/**
 * Serialization codec used for records embedded in their owner's row.
 *
 * Only the contract matters to the relation layer; the byte format is the coder's own.
 */
export interface CoderContract {
  /** Codec name, e.g. `json`. */
  readonly name: string;

  /** Serialize an attribute snapshot. */
  dump(attributes: Record<string, unknown>): string;

  /** Deserialize a stored snapshot. */
  load(payload: string): Record<string, unknown>;
}
