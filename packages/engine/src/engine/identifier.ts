import { CacheConfigurationError } from "../errors";

export interface IdentifierOptions {
  /**
   * Used verbatim for every call when non-empty; call arguments are ignored.
   */
  fixedIdentifier?: string;
  /**
   * Position of the identifying argument. Defaults to the first one.
   */
  identifierIndex?: number;
  /**
   * Property looked up on a trailing options object; takes precedence over
   * the positional argument when present.
   */
  identifierName?: string;
}

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const asIdentifier = (value: unknown): string | undefined => {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
};

export function resolveIdentifier(options: IdentifierOptions, args: readonly unknown[]): string {
  if (options.fixedIdentifier) {
    return options.fixedIdentifier;
  }

  const name = options.identifierName;
  if (name) {
    const last = args.length > 0 ? args[args.length - 1] : undefined;
    if (isPlainObject(last) && Object.prototype.hasOwnProperty.call(last, name)) {
      const named = asIdentifier(last[name]);
      if (named !== undefined) {
        return named;
      }
    }
  }

  const index = options.identifierIndex ?? 0;
  if (!Number.isInteger(index) || index < 0 || index >= args.length) {
    throw new CacheConfigurationError(
      `Invalid cache configuration. Cannot determine identifier from params (index ${index}, ${args.length} given)`
    );
  }
  const positional = asIdentifier(args[index]);
  if (positional === undefined) {
    throw new CacheConfigurationError(
      `Invalid cache configuration. Argument ${index} is not a string or number identifier`
    );
  }
  return positional;
}
