import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { FatalConfigError, errorMessage } from "../core/errors";
import type { Instrument } from "../types/models";
import { instrumentFileSchema } from "../types/schemas";

export const parseInstrumentCatalog = (raw: unknown, source = "instrument catalog"): Instrument[] => {
  const parsed = instrumentFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid";
    throw new FatalConfigError(`Invalid ${source} (${where})`);
  }

  const seen = new Set<string>();
  for (const instrument of parsed.data.instruments) {
    if (seen.has(instrument.id)) throw new FatalConfigError(`Duplicate instrument ${instrument.id} in ${source}`);
    seen.add(instrument.id);
  }
  return parsed.data.instruments.map((instrument) => Object.freeze({ ...instrument }));
};

/** Narrows the catalog to the configured universe; an empty universe keeps every instrument. */
export const resolveUniverse = (catalog: Instrument[], symbols: string[]): Instrument[] => {
  if (symbols.length === 0) return catalog;
  const byId = new Map(catalog.map((instrument) => [instrument.id, instrument]));
  const unknown = symbols.filter((symbol) => !byId.has(symbol));
  if (unknown.length > 0) {
    throw new FatalConfigError(`Universe symbols not in the instrument catalog: ${unknown.join(", ")}`);
  }
  const resolved: Instrument[] = [];
  for (const symbol of new Set(symbols)) {
    const instrument = byId.get(symbol);
    if (instrument) resolved.push(instrument);
  }
  return resolved;
};

export const loadInstrumentUniverse = (path: string, symbols: string[]): Instrument[] => {
  const fullPath = resolve(path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, "utf8"));
  } catch (error) {
    throw new FatalConfigError(`Cannot read instrument catalog at ${fullPath}: ${errorMessage(error)}`, {
      cause: error
    });
  }
  return resolveUniverse(parseInstrumentCatalog(raw, fullPath), symbols);
};
