import type { ParameterType, TypeTag } from "../types.js";

export class DispatchError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DispatchError";
  }
}

/** Invalid or empty vocabulary. Fatal to activation. */
export class ConfigError extends DispatchError {
  constructor(message = "Invalid vocabulary", details?: Record<string, unknown>) {
    super("CONFIG_INVALID", message, details);
    this.name = "ConfigError";
  }
}

export class ResourceUnavailableError extends DispatchError {
  constructor(public readonly resourcePath: string) {
    super("RESOURCE_UNAVAILABLE", `Grammar file not found: ${resourcePath}`, {
      resourcePath,
    });
    this.name = "ResourceUnavailableError";
  }
}

export class CoercionError extends DispatchError {
  constructor(
    public readonly typeTag: TypeTag,
    public readonly raw: string | undefined,
    public readonly reason: string,
    public readonly key?: string
  ) {
    super(
      "COERCION_FAILED",
      `Cannot read ${raw === undefined ? "missing value" : `"${raw}"`} as ${typeTag}${key ? ` for "${key}"` : ""}: ${reason}`,
      { typeTag, raw, key }
    );
    this.name = "CoercionError";
  }

  withKey(key: string): CoercionError {
    return new CoercionError(this.typeTag, this.raw, this.reason, key);
  }
}

export class HandlerResolutionError extends DispatchError {
  constructor(
    public readonly action: string,
    public readonly handler: string,
    public readonly attemptedTypes: readonly ParameterType[]
  ) {
    super(
      "HANDLER_UNRESOLVED",
      `No overload of ${handler} for "${action}" accepts (${attemptedTypes.join(", ")})`,
      { action, handler, attemptedTypes }
    );
    this.name = "HandlerResolutionError";
  }
}
