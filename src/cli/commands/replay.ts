import * as fs from "fs";
import * as path from "path";
import { Components } from "../../board/Components";
import { getConfig, loadSettings } from "../config";
import { applyScript, loadScript, ScriptError, StepOutcome } from "../script";
import { die, flagValue, formatPlacementTable, positionalArgs } from "../utils";
import { writeCpl } from "../utils/cpl";

/** One progress line per step, or null for steps with nothing to report. */
export function describeOutcome(outcome: StepOutcome): string | null {
  if (outcome.created !== undefined) {
    return `  → step ${outcome.step}: added component #${outcome.created}`;
  }
  if (outcome.applied === undefined) return null;
  if (!outcome.applied) {
    return `  → step ${outcome.step}: nothing to ${outcome.kind}`;
  }
  const moved = outcome.moved?.length ? outcome.moved.join(", ") : "no components";
  return `  → step ${outcome.step}: ${outcome.kind} restored ${moved}`;
}

/**
 * replay: run an edit script against an empty board and print the result
 */
export async function cmdReplay(args: string[]): Promise<void> {
  const [entry] = positionalArgs(args, ["--cpl", "--root"]);
  if (!entry) {
    die("replay needs a script file, e.g. board-edit replay edits.yml");
  }
  const cplPath = flagValue(args, "--cpl");

  const { projectRoot } = getConfig();
  const scriptPath = path.resolve(projectRoot, entry);
  if (!fs.existsSync(scriptPath)) {
    die(`Script not found: ${scriptPath}`);
  }

  const settings = loadSettings(projectRoot);
  const components = new Components();
  components.setFlipStyleRotateFirst(settings.flipStyleRotateFirst);

  console.log(`\n🚀  Replaying: ${path.basename(scriptPath)}\n`);

  try {
    const script = loadScript(fs.readFileSync(scriptPath, "utf-8"));
    for (const outcome of applyScript(script, components)) {
      const line = describeOutcome(outcome);
      if (line) console.log(line);
    }
  } catch (err) {
    if (err instanceof ScriptError || err instanceof RangeError) {
      die(`Replay failed: ${err.message}`);
    }
    throw err;
  }

  const placed = [...components];
  console.log(`\n✨  Placement (${placed.length} of ${components.count()} components on the board)\n` + "─".repeat(30));
  for (const line of formatPlacementTable(placed)) {
    console.log(line);
  }
  console.log("─".repeat(30));

  if (cplPath) {
    const written = writeCpl(placed, settings, path.resolve(projectRoot, cplPath));
    console.log(`  ✅ CPL written to ${written}`);
  }
}
