/**
 * Handler descriptors.
 *
 * A handler is a named set of call shapes. Each overload declares its
 * parameter types as data, so dispatch resolves a target by comparing the
 * bound argument signature against those lists instead of inspecting
 * functions at runtime.
 */

import type { BoundValue, ParameterType, ScalarTypeName } from "../types.js";
import { ConfigError } from "./errors.js";
import type { ActionVocabulary } from "./vocabulary.js";

// === Parameter type → value type ===

type ScalarValueOf<T> = T extends "bool"
  ? boolean
  : T extends "int64" | "uint64"
    ? bigint
    : T extends "datetime"
      ? Date
      : T extends "string" | "decimal"
        ? string
        : number;

export type ValueOf<P> = P extends `${infer S extends ScalarTypeName}[]`
  ? ScalarValueOf<S>[]
  : ScalarValueOf<P>;

export type ArgsOf<P extends readonly ParameterType[]> = {
  -readonly [K in keyof P]: ValueOf<P[K]>;
};

// === Descriptors ===

export interface HandlerOverload {
  readonly params: readonly ParameterType[];
  readonly invoke: (args: readonly BoundValue[]) => void;
}

export interface HandlerDescriptor {
  readonly name: string;
  readonly overloads: readonly HandlerOverload[];
}

export interface HandlerBuilder extends HandlerDescriptor {
  on<const P extends readonly ParameterType[]>(
    params: P,
    fn: (...args: ArgsOf<P>) => void
  ): HandlerBuilder;
}

export function defineHandler(
  name: string,
  overloads: readonly HandlerOverload[] = []
): HandlerBuilder {
  return {
    name,
    overloads,
    on<const P extends readonly ParameterType[]>(
      params: P,
      fn: (...args: ArgsOf<P>) => void
    ): HandlerBuilder {
      const overload: HandlerOverload = {
        params: [...params],
        invoke: (args) => {
          Reflect.apply(fn, undefined, args);
        },
      };
      return defineHandler(name, [...overloads, overload]);
    },
  };
}

export function findOverload(
  descriptor: HandlerDescriptor,
  signature: readonly ParameterType[]
): HandlerOverload | undefined {
  return descriptor.overloads.find(
    (overload) =>
      overload.params.length === signature.length &&
      overload.params.every((param, index) => param === signature[index])
  );
}

// === Registry ===

export interface HandlerRegistry {
  get(ref: string): HandlerDescriptor | undefined;
}

export function createHandlerRegistry(
  descriptors: readonly HandlerDescriptor[]
): HandlerRegistry {
  const byName = new Map<string, HandlerDescriptor>();
  for (const descriptor of descriptors) {
    byName.set(descriptor.name, descriptor);
  }
  return {
    get: (ref) => byName.get(ref),
  };
}

/** Trigger keyword → descriptors of every handler the action names, in order. */
export type HandlerTable = ReadonlyMap<string, readonly HandlerDescriptor[]>;

export function bindHandlers(
  vocabulary: ActionVocabulary,
  registry: HandlerRegistry
): HandlerTable {
  const table = new Map<string, readonly HandlerDescriptor[]>();
  const missing: string[] = [];

  for (const action of vocabulary.actions) {
    const descriptors: HandlerDescriptor[] = [];
    for (const ref of action.handlerRefs) {
      const descriptor = registry.get(ref);
      if (descriptor) {
        descriptors.push(descriptor);
      } else {
        missing.push(`${action.triggerKeyword} → ${ref}`);
      }
    }
    table.set(action.triggerKeyword, descriptors);
  }

  if (missing.length > 0) {
    throw new ConfigError(`Unregistered handlers: ${missing.join(", ")}`, { missing });
  }
  return table;
}
