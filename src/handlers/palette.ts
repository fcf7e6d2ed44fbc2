import type { Logger } from "../ui/logger.js";
import { defineHandler, type HandlerDescriptor } from "../core/handlers.js";

export function createPaletteHandlers(output: Logger): HandlerDescriptor[] {
  const swatches: string[] = [];

  return [
    defineHandler("palette.paint").on(["string[]"], (colors) => {
      swatches.push(...colors);
      output(`[palette] Painted ${colors.join(", ")} (${swatches.length} swatches)`);
    }),

    defineHandler("palette.shade")
      .on(["string[]", "uint32"], (colors, percent) => {
        output(`[palette] Shaded ${colors.join(", ")} by ${percent}%`);
      })
      .on(["string", "uint32"], (color, percent) => {
        output(`[palette] Shaded ${color} by ${percent}%`);
      }),

    defineHandler("palette.clear").on([], () => {
      swatches.length = 0;
      output("[palette] Cleared");
    }),
  ];
}
