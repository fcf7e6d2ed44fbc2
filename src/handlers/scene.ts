/**
 * Demo handlers: a point in 3D space moved by voice.
 */

import type { Logger } from "../ui/logger.js";
import { defineHandler, type HandlerDescriptor } from "../core/handlers.js";

export type Direction = "left" | "right" | "up" | "down" | "forward" | "back";

export interface Position {
  x: number;
  y: number;
  z: number;
}

// Metres per spoken unit; unrecognized units fall back to centimetres.
const UNIT_TO_METRES = new Map<string, number>([
  ["m", 1],
  ["meter", 1],
  ["meters", 1],
  ["cm", 0.01],
  ["centimeters", 0.01],
  ["mm", 0.001],
  ["millimeters", 0.001],
  ["inch", 0.0254],
  ["inches", 0.0254],
  ["foot", 0.3048],
  ["feet", 0.3048],
  ["yard", 0.9144],
  ["yards", 0.9144],
]);
const FALLBACK_UNIT = 0.01;

const AXIS: Record<Direction, [keyof Position, 1 | -1]> = {
  left: ["x", -1],
  right: ["x", 1],
  up: ["y", 1],
  down: ["y", -1],
  forward: ["z", 1],
  back: ["z", -1],
};

export function unitToMetres(unit: string | undefined): number {
  if (!unit) return FALLBACK_UNIT;
  return UNIT_TO_METRES.get(unit.toLowerCase()) ?? FALLBACK_UNIT;
}

function isDirection(value: string): value is Direction {
  return Object.hasOwn(AXIS, value);
}

export interface Scene {
  readonly position: Readonly<Position>;
  readonly handlers: HandlerDescriptor[];
}

export function createScene(output: Logger): Scene {
  const position: Position = { x: 0, y: 0, z: 0 };
  let halted = false;

  function move(direction: string, metres: number): void {
    if (halted) {
      output(`[scene] Halted; ignoring move ${direction}`);
      return;
    }
    if (!isDirection(direction)) {
      output(`[scene] Unknown direction "${direction}"`);
      return;
    }
    const [axis, sign] = AXIS[direction];
    position[axis] = Number((position[axis] + sign * metres).toFixed(6));
    output(`[scene] Moved ${direction} ${metres}m → (${position.x}, ${position.y}, ${position.z})`);
  }

  const handlers = [
    defineHandler("scene.move")
      .on(["string"], (direction) => move(direction, unitToMetres(undefined)))
      .on(["string", "float"], (direction, distance) => move(direction, distance * FALLBACK_UNIT))
      .on(["string", "float", "string"], (direction, distance, unit) =>
        move(direction, distance * unitToMetres(unit))
      ),

    defineHandler("scene.stop").on([], () => {
      halted = true;
      output("[scene] Stopped");
    }),

    defineHandler("scene.resume").on([], () => {
      halted = false;
      output("[scene] Resumed");
    }),

    defineHandler("scene.reset").on([], () => {
      position.x = 0;
      position.y = 0;
      position.z = 0;
      halted = false;
      output("[scene] Reset to origin");
    }),

    defineHandler("scene.report").on([], () => {
      output(`[scene] At (${position.x}, ${position.y}, ${position.z})${halted ? ", halted" : ""}`);
    }),
  ];

  return { position, handlers };
}
