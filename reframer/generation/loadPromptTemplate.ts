import { readFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../../logging/redactSecrets.js";

export const PROMPT_TEMPLATE_FILE = "prompt.txt";

export async function loadPromptTemplate(promptsDir: string): Promise<string> {
  try {
    return (await readFile(path.join(promptsDir, PROMPT_TEMPLATE_FILE), "utf-8")).trim();
  } catch (e) {
    throw new Error(`Error loading prompt template: ${errorMessage(e)}`);
  }
}
