import process from "node:process";
import { COLOR_CODES } from "../config/constants.js";
import type { ActionVocabulary } from "../core/vocabulary.js";
import type { DispatchReport } from "../types.js";
import { colorize } from "./logger.js";

export function blankLine(debugMode: boolean): void {
  if (debugMode) {
    process.stdout.write("\n");
  }
}

export function separator(debugMode: boolean, label = ""): void {
  if (!debugMode) return;
  const line = "─".repeat(10);
  if (label) {
    console.log(colorize(`${line} ${label} ${line}`, COLOR_CODES.session));
  } else {
    console.log(colorize(line, COLOR_CODES.session));
  }
}

export function formatVocabulary(vocabulary: ActionVocabulary): string[] {
  const lines = [`primary key: ${vocabulary.primaryActionKey}`, "actions:"];
  for (const action of vocabulary.actions) {
    const key = action.keyCode ? ` [${action.keyCode}]` : "";
    const order = action.argumentPrecedence.length > 0
      ? ` (${action.argumentPrecedence.join(", ")})`
      : "";
    lines.push(`  ${action.triggerKeyword}${key}${order} → ${action.handlerRefs.join(", ") || "(none)"}`);
  }
  if (vocabulary.argumentSpecs.length > 0) {
    lines.push("arguments:");
    for (const spec of vocabulary.argumentSpecs) {
      const collection = spec.isCollection ? "[]" : "";
      const defaults = spec.defaults.length > 0 ? ` defaults=${spec.defaults.join(",")}` : "";
      lines.push(`  ${spec.key}: ${spec.typeTag}${collection}${defaults}`);
    }
  }
  return lines;
}

export function formatReport(report: DispatchReport): string {
  if (report.outcomes.length === 0) return `${report.action}: no handlers`;
  return `${report.action}: ${report.outcomes
    .map((outcome) => `${outcome.handler} ${outcome.status}`)
    .join(", ")}`;
}
