import { NameRepairError } from "./errors";

export type NameRepairFn = (names: string[]) => string[];

export type NameRepair = "minimal" | "unique" | "unique_quiet" | "check_unique" | NameRepairFn;

export interface Rename {
  position: number;
  from: string;
  to: string;
}

export interface RepairedNames {
  names: string[];
  /** Renames made by `unique`; always empty for the other policies. */
  renamed: Rename[];
}

const POSITION_SUFFIX = /\.\.\.\d+$/u;
const DOT_DOT = /^\.\.(?:\.|\d+)$/u;

export function repair_names(
  names: Array<string | null | undefined>,
  repair: NameRepair = "unique",
  arg = "names_repair"
): RepairedNames {
  const minimal = names.map((name) => name ?? "");

  if (typeof repair === "function") {
    const repaired: unknown = repair([...minimal]);
    if (
      !Array.isArray(repaired) ||
      repaired.length !== minimal.length ||
      !repaired.every((name): name is string => typeof name === "string")
    ) {
      throw new NameRepairError(
        `\`${arg}\` must return ${minimal.length} names as strings.`,
        minimal
      );
    }
    return { names: repaired, renamed: [] };
  }

  switch (repair) {
    case "minimal":
      return { names: minimal, renamed: [] };
    case "check_unique":
      checkUnique(minimal, arg);
      return { names: minimal, renamed: [] };
    case "unique":
      return uniqueNames(minimal);
    case "unique_quiet":
      return { names: uniqueNames(minimal).names, renamed: [] };
  }
}

function uniqueNames(names: string[]): RepairedNames {
  const stripped = names.map((name) => (DOT_DOT.test(name) ? "" : name.replace(POSITION_SUFFIX, "")));
  const counts = new Map<string, number>();
  for (const name of stripped) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  const out = stripped.map((name, position) => {
    const needsSuffix = name === "" || (counts.get(name) ?? 0) > 1;
    return needsSuffix ? `${name}...${position + 1}` : name;
  });

  const renamed: Rename[] = [];
  out.forEach((name, position) => {
    const from = names[position] ?? "";
    if (name !== from) {
      renamed.push({ position, from, to: name });
    }
  });
  return { names: out, renamed };
}

function checkUnique(names: string[], arg: string): void {
  const empty = names.filter((name) => name === "");
  if (empty.length > 0) {
    throw new NameRepairError(`Names can't be empty (\`${arg}\`).`, empty);
  }

  const dotDot = names.filter((name) => DOT_DOT.test(name));
  if (dotDot.length > 0) {
    throw new NameRepairError(
      `Names can't be of the form \`...\` or \`..j\`: ${dotDot.map((name) => `\`${name}\``).join(", ")}.`,
      dotDot
    );
  }

  const seen = new Set<string>();
  const duplicated: string[] = [];
  for (const name of names) {
    if (seen.has(name) && !duplicated.includes(name)) {
      duplicated.push(name);
    }
    seen.add(name);
  }
  if (duplicated.length > 0) {
    throw new NameRepairError(
      `Names must be unique; duplicated: ${duplicated.map((name) => `\`${name}\``).join(", ")}. ` +
        `Use \`${arg}\` to specify how to repair.`,
      duplicated
    );
  }
}

export function describeRenames(renamed: Rename[]): string {
  return ["New names:", ...renamed.map((rename) => `* \`${rename.from}\` -> \`${rename.to}\``)].join("\n");
}
