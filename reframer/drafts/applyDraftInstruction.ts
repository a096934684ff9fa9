import { PresetNotFoundError } from "../errors.js";
import { sanitizeInstruction } from "../instructions/sanitizeInstruction.js";
import type { DraftRecord } from "./draftTypes.js";

export type InstructionChange = "preset" | "added" | "updated" | "cleared";

/**
 * A draft carries either a preset or a custom instruction, never both. A
 * preset wins when both are submitted.
 */
export function applyDraftInstruction(
  draft: DraftRecord,
  input: { preset?: string | null; instruction?: string | null },
  knownPresets: ReadonlySet<string>
): { draft: DraftRecord; change: InstructionChange } {
  const preset = input.preset?.trim() ?? "";
  if (preset.length > 0) {
    if (!knownPresets.has(preset)) throw new PresetNotFoundError(preset);
    return { draft: { ...draft, preset_id: preset, instruction: "" }, change: "preset" };
  }

  const instruction = sanitizeInstruction(input.instruction ?? "");
  if (instruction.length > 0) {
    const hadInstruction = draft.instruction.length > 0 || draft.preset_id !== null;
    return {
      draft: { ...draft, instruction, preset_id: null },
      change: hadInstruction ? "updated" : "added",
    };
  }

  return { draft: { ...draft, instruction: "", preset_id: null }, change: "cleared" };
}
