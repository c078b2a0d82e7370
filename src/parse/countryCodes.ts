import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../core/errors";
import builtinCountryCodes from "./countryCodes.json";

export type CountryCodeTable = Readonly<Record<string, string>>;

const countryTableSchema = z.record(z.string().regex(/^[A-Z]{3}$/), z.string().min(1));

export const DEFAULT_COUNTRY_CODES: CountryCodeTable = Object.freeze({ ...builtinCountryCodes });

/**
 * Returns the built-in table, extended or overridden by the entries of the JSON
 * file at `overridePath` when one is given.
 */
export function loadCountryCodes(overridePath?: string): CountryCodeTable {
  if (!overridePath) {
    return DEFAULT_COUNTRY_CODES;
  }

  const absolutePath = path.resolve(overridePath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Country code table not found: ${absolutePath}`);
  }

  const parsed = countryTableSchema.safeParse(JSON.parse(fs.readFileSync(absolutePath, "utf-8")));
  if (!parsed.success) {
    throw new ConfigError(`Invalid country code table ${absolutePath}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }

  return Object.freeze({ ...DEFAULT_COUNTRY_CODES, ...parsed.data });
}

export function countryForToken(token: string, table: CountryCodeTable): string | undefined {
  const prefix = token.split("-")[0];
  return prefix ? table[prefix] : undefined;
}
