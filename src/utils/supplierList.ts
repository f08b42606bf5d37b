import * as fs from "fs";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import type { Logger } from "./logger";

const parmaCode = z.union([z.string().min(1), z.number().int().nonnegative()]);

const peopleFileSchema = z.object({
  people: z
    .array(
      z.object({
        name: z.string().optional(),
        parma_codes: z.array(parmaCode).default([])
      })
    )
    .default([])
});

export type PeopleFile = z.infer<typeof peopleFileSchema>;

/** Unique PARMA codes across everyone in the file, ascending (numbers compared as numbers) */
export function collectSupplierIds(file: PeopleFile): string[] {
  const codes = new Set<string>();
  for (const person of file.people) {
    for (const code of person.parma_codes) {
      codes.add(String(code).trim());
    }
  }
  return [...codes].sort((a, b) => a.localeCompare(b, "en", { numeric: true }));
}

function readToml(source: string, tomlPath: string): unknown {
  try {
    return parseToml(source);
  } catch (err) {
    throw new Error(`Invalid supplier list in ${tomlPath}: ${String(err)}`);
  }
}

export function parseSupplierToml(source: string, tomlPath: string): string[] {
  const result = peopleFileSchema.safeParse(readToml(source, tomlPath));
  if (!result.success) {
    throw new Error(`Invalid supplier list in ${tomlPath}: ${result.error.message}`);
  }

  const ids = collectSupplierIds(result.data);
  if (ids.length === 0) {
    throw new Error(`No PARMA codes found in ${tomlPath}`);
  }
  return ids;
}

export async function loadSupplierIdsFromToml(
  tomlPath: string,
  logger: Logger
): Promise<string[]> {
  if (!fs.existsSync(tomlPath)) {
    throw new Error(`${tomlPath} not found`);
  }

  const source = await fs.promises.readFile(tomlPath, "utf-8");
  const ids = parseSupplierToml(source, tomlPath);
  logger.info(`Loaded ${ids.length} unique PARMA codes from ${tomlPath}`, ids);
  return ids;
}
