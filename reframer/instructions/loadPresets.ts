import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "../../logging/redactSecrets.js";
import { getConfig } from "../config/loadConfig.js";

const PRESET_FILE = /^preset_([a-z0-9_]+)\.txt$/;
const PRESET_NAME = /^[a-z0-9_]+$/;
const METADATA_FILE = "presets.json";

const PresetMetadataSchema = z.array(
  z.object({
    name: z.string().regex(PRESET_NAME),
    title: z.string().min(1),
    description: z.string(),
  })
);

type PresetMetadata = z.infer<typeof PresetMetadataSchema>[number];

export type PresetInstruction = {
  name: string;
  filename: string;
  title: string;
  description: string;
  content: string;
};

function isMissingFile(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

function titleCase(name: string): string {
  return name
    .split("_")
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(" ");
}

async function readPresetMetadata(dir: string): Promise<PresetMetadata[]> {
  let raw: string;
  try {
    raw = await readFile(path.join(dir, METADATA_FILE), "utf-8");
  } catch (e) {
    if (isMissingFile(e)) return [];
    throw e;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    console.warn("[presets] ignoring unreadable metadata", { file: METADATA_FILE, msg: errorMessage(e) });
    return [];
  }

  const parsed = PresetMetadataSchema.safeParse(json);
  if (!parsed.success) {
    console.warn("[presets] ignoring invalid metadata", { file: METADATA_FILE, issues: parsed.error.issues.length });
    return [];
  }
  return parsed.data;
}

/**
 * Every `preset_<name>.txt` in the prompts directory, in the order given by
 * presets.json. Presets without metadata follow, sorted by name.
 */
export async function getPresetInstructions(dir = getConfig().promptsDir): Promise<PresetInstruction[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (e) {
    if (isMissingFile(e)) return [];
    throw e;
  }

  const metadata = await readPresetMetadata(dir);
  const rank = new Map(metadata.map((m, i) => [m.name, i]));
  const byName = new Map(metadata.map((m) => [m.name, m]));

  const presets: PresetInstruction[] = [];
  for (const filename of entries) {
    const match = PRESET_FILE.exec(filename);
    if (!match) continue;
    const name = match[1];

    let content: string;
    try {
      content = (await readFile(path.join(dir, filename), "utf-8")).trim();
    } catch (e) {
      console.warn("[presets] could not read preset", { filename, msg: errorMessage(e) });
      continue;
    }
    if (content.length === 0) continue;

    const meta = byName.get(name);
    presets.push({
      name,
      filename,
      title: meta?.title ?? `Preset ${titleCase(name)}`,
      description: meta?.description ?? `Rewriting style preset ${name}`,
      content,
    });
  }

  return presets.sort((a, b) => {
    const ra = rank.get(a.name) ?? Number.MAX_SAFE_INTEGER;
    const rb = rank.get(b.name) ?? Number.MAX_SAFE_INTEGER;
    return ra !== rb ? ra - rb : a.name.localeCompare(b.name);
  });
}

export async function getPresetContent(name: string, dir = getConfig().promptsDir): Promise<string | null> {
  if (!PRESET_NAME.test(name)) return null;

  try {
    const content = (await readFile(path.join(dir, `preset_${name}.txt`), "utf-8")).trim();
    return content.length > 0 ? content : null;
  } catch (e) {
    if (isMissingFile(e)) return null;
    throw e;
  }
}
