import { z } from "zod";
import {
  InstalledEntry,
  NOT_INSTALLED,
  PackageInfo,
  PackageKind,
  ParsedInventory,
  UNKNOWN_VERSION
} from "../types.js";

const SECTION_RE = /^==>\s*(Formulae|Casks)\s*$/;

const formulaSchema = z.object({
  name: z.string().min(1),
  desc: z.string().nullish(),
  homepage: z.string().nullish(),
  license: z.string().nullish(),
  outdated: z.boolean().nullish(),
  installed: z.array(z.object({ version: z.string() })).nullish(),
  versions: z.object({ stable: z.string().nullish() }).nullish()
});

const caskSchema = z.object({
  token: z.string().min(1).nullish(),
  name: z.union([z.string(), z.array(z.string())]).nullish(),
  desc: z.string().nullish(),
  homepage: z.string().nullish(),
  outdated: z.boolean().nullish(),
  installed: z.string().nullish(),
  version: z.string().nullish()
});

const inventorySchema = z.object({
  formulae: z.array(z.unknown()).default([]),
  casks: z.array(z.unknown()).default([])
});

type FormulaJson = z.infer<typeof formulaSchema>;
type CaskJson = z.infer<typeof caskSchema>;

export function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Converts `brew info --json=v2 --installed` output into installed entries.
 * Casks come first, then formulae. Entries that do not match the expected
 * shape are skipped and reported in `errors`. Returns null when the document
 * itself is not an inventory.
 */
export function parseInstalled(data: unknown): ParsedInventory | null {
  const inventory = inventorySchema.safeParse(data);
  if (!inventory.success) {
    return null;
  }

  const entries: InstalledEntry[] = [];
  const errors: string[] = [];

  inventory.data.casks.forEach((raw, index) => {
    const cask = caskSchema.safeParse(raw);
    const name = cask.success ? caskName(cask.data) : undefined;
    if (!cask.success || !name) {
      errors.push(`casks[${index}]: unrecognized entry`);
      return;
    }
    entries.push({
      name,
      kind: "cask",
      localVersion: nonEmpty(cask.data.installed) ?? NOT_INSTALLED,
      stableVersion: nonEmpty(cask.data.version) ?? UNKNOWN_VERSION,
      outdated: cask.data.outdated ?? false
    });
  });

  inventory.data.formulae.forEach((raw, index) => {
    const formula = formulaSchema.safeParse(raw);
    if (!formula.success) {
      errors.push(`formulae[${index}]: unrecognized entry`);
      return;
    }
    entries.push({
      name: formula.data.name,
      kind: "formula",
      localVersion: nonEmpty(formula.data.installed?.[0]?.version) ?? NOT_INSTALLED,
      stableVersion: nonEmpty(formula.data.versions?.stable) ?? UNKNOWN_VERSION,
      outdated: formula.data.outdated ?? false
    });
  });

  return { entries, errors };
}

/** Maps every token and name in a `brew info --json=v2` document to its published version. */
export function parseVersionLookup(data: unknown): Map<string, string> {
  const lookup = new Map<string, string>();
  const inventory = inventorySchema.safeParse(data);
  if (!inventory.success) {
    return lookup;
  }

  for (const raw of inventory.data.formulae) {
    const formula = formulaSchema.safeParse(raw);
    const version = formula.success ? nonEmpty(formula.data.versions?.stable) : undefined;
    if (formula.success && version) {
      lookup.set(formula.data.name, version);
    }
  }

  for (const raw of inventory.data.casks) {
    const cask = caskSchema.safeParse(raw);
    if (!cask.success) {
      continue;
    }
    const version = nonEmpty(cask.data.version);
    if (!version) {
      continue;
    }
    for (const key of caskKeys(cask.data)) {
      lookup.set(key, version);
    }
  }

  return lookup;
}

export function parsePackageInfo(data: unknown): PackageInfo[] {
  const inventory = inventorySchema.safeParse(data);
  if (!inventory.success) {
    return [];
  }

  const out: PackageInfo[] = [];

  for (const raw of inventory.data.formulae) {
    const formula = formulaSchema.safeParse(raw);
    if (formula.success) {
      out.push(formulaInfo(formula.data));
    }
  }

  for (const raw of inventory.data.casks) {
    const cask = caskSchema.safeParse(raw);
    const name = cask.success ? caskName(cask.data) : undefined;
    if (cask.success && name) {
      const installed = nonEmpty(cask.data.installed);
      out.push({
        kind: "cask",
        name,
        description: nonEmpty(cask.data.desc) ?? "No description",
        homepage: nonEmpty(cask.data.homepage) ?? "",
        version: nonEmpty(cask.data.version) ?? UNKNOWN_VERSION,
        installed: installed ? [installed] : []
      });
    }
  }

  return out;
}

/** Splits free-text `brew search` output into package names, dropping section headings. */
export function parseSearchOutput(output: string): string[] {
  return [...parseSearchSections(output).keys()];
}

/**
 * Maps every name in `brew search` output to the section it was listed under.
 * Names printed before any `==> Formulae` / `==> Casks` heading have no known
 * kind. A name listed in both sections keeps the first one.
 */
export function parseSearchSections(output: string): Map<string, PackageKind | undefined> {
  const names = new Map<string, PackageKind | undefined>();
  let section: PackageKind | undefined;
  for (const line of output.split("\n")) {
    const heading = SECTION_RE.exec(line.trim());
    if (heading) {
      section = heading[1] === "Casks" ? "cask" : "formula";
      continue;
    }
    for (const token of line.split(/\s+/)) {
      if (token && !names.has(token)) {
        names.set(token, section);
      }
    }
  }
  return names;
}

function formulaInfo(formula: FormulaJson): PackageInfo {
  const info: PackageInfo = {
    kind: "formula",
    name: formula.name,
    description: nonEmpty(formula.desc) ?? "No description",
    homepage: nonEmpty(formula.homepage) ?? "",
    version: nonEmpty(formula.versions?.stable) ?? UNKNOWN_VERSION,
    installed: (formula.installed ?? []).map((entry) => entry.version)
  };
  const license = nonEmpty(formula.license);
  if (license) {
    info.license = license;
  }
  return info;
}

function caskName(cask: CaskJson): string | undefined {
  return caskKeys(cask)[0];
}

function caskKeys(cask: CaskJson): string[] {
  const keys: string[] = [];
  const token = nonEmpty(cask.token);
  if (token) {
    keys.push(token);
  }
  const names = typeof cask.name === "string" ? [cask.name] : cask.name ?? [];
  for (const name of names) {
    if (name && !keys.includes(name)) {
      keys.push(name);
    }
  }
  return keys;
}

function nonEmpty(value: string | null | undefined): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
