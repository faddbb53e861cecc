import { mkdir, open, readFile, rename } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { IndexCorruptionError } from "./errors.js";
import type { Manifest, ManifestEntry } from "./types.js";

const ManifestEntrySchema = z.object({
  contentHash: z.string().min(1),
  chunkIds: z.array(z.string()),
  embeddingModel: z.string(),
  chunkingStrategy: z.string(),
  pageCount: z.number().int().nonnegative(),
  mtime: z.number(),
  size: z.number().nonnegative(),
  indexedAt: z.string(),
});

const ManifestSchema = z.record(z.string(), ManifestEntrySchema);

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadManifest(manifestPath: string): Promise<Manifest> {
  let data: string;
  try {
    data = await readFile(manifestPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw new IndexCorruptionError(`cannot read ${manifestPath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (err) {
    throw new IndexCorruptionError(`${manifestPath} is not valid JSON`, { cause: err });
  }

  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IndexCorruptionError(`${manifestPath} has an unexpected shape`, { cause: parsed.error });
  }
  return parsed.data;
}

/** Temp file, fsync, then rename: readers never see a half-written manifest. */
export async function saveManifest(manifestPath: string, manifest: Manifest): Promise<void> {
  await mkdir(path.dirname(manifestPath), { recursive: true });
  const tmpPath = `${manifestPath}.tmp`;
  const handle = await open(tmpPath, "w");
  try {
    await handle.writeFile(JSON.stringify(sortManifest(manifest), null, 2));
    await handle.sync();
  } finally {
    await handle.close();
  }
  await rename(tmpPath, manifestPath);
}

/** Stable key order keeps identical manifests byte-identical on disk. */
function sortManifest(manifest: Manifest): Manifest {
  const sorted: Manifest = {};
  for (const key of Object.keys(manifest).sort()) {
    const entry = manifest[key];
    if (entry) sorted[key] = entry;
  }
  return sorted;
}

export function manifestEntriesEqual(a: ManifestEntry | undefined, b: ManifestEntry | undefined): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}
