import type { Component } from "../board/Component";

export function die(msg: string): never {
  console.error(`❌  ${msg}`);
  process.exit(1);
}

/** Value of `--flag <value>` in an argument list */
export function flagValue(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  if (i === -1) return undefined;
  const value = args[i + 1];
  if (value === undefined || value.startsWith("--")) {
    die(`${flag} needs a value`);
  }
  return value;
}

/** Arguments that are neither flags nor flag values */
export function positionalArgs(args: string[], flagsWithValue: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (flagsWithValue.includes(args[i])) {
      i++;
      continue;
    }
    if (!args[i].startsWith("--")) result.push(args[i]);
  }
  return result;
}

/**
 * One line per component:
 * number, name, location, rotation, side and package, in aligned columns.
 */
export function formatPlacementTable(components: Iterable<Component>): string[] {
  const rows = [...components].map((c) => [
    `#${c.number}`,
    c.name,
    `(${c.location.x}, ${c.location.y})`,
    `${c.rotation.toFixed(1)}°`,
    c.side,
    c.getPackage().name + (c.positionFixed ? " [fixed]" : ""),
  ]);
  if (rows.length === 0) return [];

  const widths = rows[0].map((_, col) => Math.max(...rows.map((r) => r[col].length)));
  return rows.map((r) => "  " + r.map((cell, col) => cell.padEnd(widths[col])).join("  ").trimEnd());
}
