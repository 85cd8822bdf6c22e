import { isPlainObject } from "@mongez/supportive-is";
import type { CoderContract } from "../contracts/coder.contract";

/**
 * Default coder: embedded records are stored as JSON strings.
 */
export class JsonCoder implements CoderContract {
  public readonly name = "json";

  public dump(attributes: Record<string, unknown>): string {
    return JSON.stringify(attributes);
  }

  public load(payload: string): Record<string, unknown> {
    const value: unknown = JSON.parse(payload);

    if (typeof value !== "object" || value === null || !isPlainObject(value)) {
      throw new Error(`Embedded payload must decode to an object, got: ${payload}`);
    }

    return toRecord(value);
  }
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

export const jsonCoder = new JsonCoder();
