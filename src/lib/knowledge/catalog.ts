import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { KnowledgeCatalogError } from "@/lib/errors";
import type { AuxiliaryEntry, KnowledgeEntry } from "@/lib/knowledge/types";
import { type Result, err, errorMessage, ok } from "@/lib/result";

const knowledgeEntrySchema = z.object({
  grade: z.number().int().min(1).max(12),
  subject: z.string().trim().min(1),
  chapterNumber: z.number().int().nonnegative(),
  chapterName: z.string().trim().min(1),
  content: z.string().trim().min(1),
});

const curatedCatalogSchema = z.array(knowledgeEntrySchema).min(1);

// Extra fields in auxiliary files are dropped by zod's default object parsing.
const auxiliaryCatalogSchema = z.array(
  z.object({
    topic: z.string(),
    content: z.string(),
  }),
);

export type AuxiliaryCatalogs = {
  catalogs: Map<string, AuxiliaryEntry[]>;
  skipped: Array<{ name: string; reason: string }>;
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export function toCanonicalText(entry: KnowledgeEntry): string {
  return `Grade ${entry.grade} ${entry.subject}: ${entry.chapterName} - ${entry.content}`;
}

export function toAuxiliaryText(entry: AuxiliaryEntry): string {
  return `${entry.topic}: ${entry.content}`;
}

export function parseCuratedCatalog(raw: unknown, source = "curated catalog"): KnowledgeEntry[] {
  const parsed = curatedCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new KnowledgeCatalogError(`Malformed ${source}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.map((entry) => Object.freeze({ ...entry }));
}

export async function readCuratedCatalog(filePath: string): Promise<KnowledgeEntry[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf-8")) as unknown;
  } catch (error) {
    throw new KnowledgeCatalogError(`Unable to read curated catalog ${filePath}: ${errorMessage(error)}`);
  }
  return parseCuratedCatalog(raw, `curated catalog ${filePath}`);
}

export function parseAuxiliaryCatalog(raw: unknown): Result<AuxiliaryEntry[], string> {
  const parsed = auxiliaryCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    return err(describeIssues(parsed.error));
  }
  return ok(parsed.data.map((entry) => Object.freeze({ topic: entry.topic, content: entry.content })));
}

async function readAuxiliaryFile(filePath: string): Promise<Result<AuxiliaryEntry[], string>> {
  try {
    return parseAuxiliaryCatalog(JSON.parse(await readFile(filePath, "utf-8")) as unknown);
  } catch (error) {
    return err(errorMessage(error, "unreadable file"));
  }
}

async function listJsonFiles(directory: string): Promise<string[] | null> {
  try {
    const names = await readdir(directory);
    return names.filter((name) => name.endsWith(".json")).sort();
  } catch (error) {
    console.warn("[knowledge-catalog] knowledge base directory not readable, skipping auxiliary catalogs", {
      directory,
      message: errorMessage(error),
    });
    return null;
  }
}

/**
 * Loads every `*.json` file in `directory` as a named catalog. A malformed
 * file is reported in `skipped` and never prevents the others from loading.
 */
export async function readAuxiliaryCatalogs(directory: string): Promise<AuxiliaryCatalogs> {
  const result: AuxiliaryCatalogs = { catalogs: new Map(), skipped: [] };
  const files = await listJsonFiles(directory);
  if (!files) {
    return result;
  }

  for (const fileName of files) {
    const name = path.basename(fileName, ".json");
    const loaded = await readAuxiliaryFile(path.join(directory, fileName));

    if (!loaded.ok) {
      console.warn("[knowledge-catalog] skipping malformed auxiliary catalog", { name, reason: loaded.error });
      result.skipped.push({ name, reason: loaded.error });
      continue;
    }

    result.catalogs.set(name, loaded.value);
  }

  return result;
}
