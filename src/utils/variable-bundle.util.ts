import { JsonObject, JsonValue, VariableBundle } from '../interface';

export type BundleDecodeResult =
  | { kind: 'object'; bundle: VariableBundle }
  | { kind: 'malformed'; reason: string }
  | { kind: 'not-an-object'; actualType: string };

/**
 * Decoding of parameter payloads into variable bundles.
 */
export class VariableBundleUtil {
  /**
   * Decode a payload that must hold a JSON object.
   *
   * @example
   * ```typescript
   * VariableBundleUtil.decode('{"mysql_port":3306}');
   * // { kind: 'object', bundle: { mysql_port: 3306 } }
   *
   * VariableBundleUtil.decode('[1,2,3]');
   * // { kind: 'not-an-object', actualType: 'array' }
   * ```
   */
  static decode(payload: string): BundleDecodeResult {
    let parsed: JsonValue;
    try {
      parsed = JSON.parse(payload);
    } catch (error) {
      return {
        kind: 'malformed',
        reason: error instanceof Error ? error.message : String(error),
      };
    }

    if (this.isJsonObject(parsed)) {
      return { kind: 'object', bundle: parsed };
    }
    return { kind: 'not-an-object', actualType: this.describeType(parsed) };
  }

  static isJsonObject(value: JsonValue): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  private static describeType(value: JsonValue): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
  }
}
