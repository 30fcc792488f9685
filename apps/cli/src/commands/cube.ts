import { Command } from "commander";
import {
  CubeState,
  InvalidMoveError,
  SOLVED_STATE,
  OPTIMAL_MAX_DEPTH,
  SeededRng,
  SearchResult,
  applyMoves,
  formatCube,
  formatMoveSequence,
  hasValidColorCounts,
  isSolvedState,
  parseCube,
  randomSeed,
  scrambleCube,
  searchSolution,
} from "@pocketsolve/game-pocketcube";
import { getConfig } from "../config";
import log from "../logger";

export const VALID_MOVES_HINT =
  "Valid moves: F R B L U D (and F' R' B' L' U' D', F2 R2 B2 L2 U2 D2)";

/** Parse a non-negative integer argument, e.g. a depth or a move count */
export function parseCount(raw: string, label: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${label}: "${raw}". Use a non-negative integer.`);
  }
  return parseInt(trimmed, 10);
}

export function scrambleLines(length: number, seed: string): string[] {
  const { state, moves } = scrambleCube(length, new SeededRng(seed));
  const cube = formatCube(state);
  return [
    `Generating random scramble with ${length} moves...`,
    "",
    `Scramble: ${formatMoveSequence(moves)}`,
    `Result:   ${cube}`,
    "",
    "Use this cube string to solve:",
    `  pocketsolve solve '${cube}'`,
  ];
}

export interface ApplyReport {
  lines: string[];
  result: CubeState;
}

/** Throws MalformedCubeError or InvalidMoveError on bad input */
export function applyReport(cubeText: string, movesText: string): ApplyReport {
  const result = applyMoves(parseCube(cubeText), movesText);
  return {
    result,
    lines: [
      `Starting: ${cubeText}`,
      `Moves:    ${movesText}`,
      "",
      `Result:   ${formatCube(result)}`,
      "",
      isSolvedState(result) ? "✓ Cube is SOLVED!" : "✗ Cube is not solved",
    ],
  };
}

export interface SolveReport {
  lines: string[];
  search: SearchResult;
  validColors: boolean;
}

export function solveReport(cubeText: string, maxDepth: number): SolveReport {
  const state = parseCube(cubeText);
  const search = searchSolution(state, maxDepth);
  const lines = [`Solving: ${cubeText}`, `Max depth: ${maxDepth}`];

  if (search.solution === null) {
    lines.push(
      `No solution found within depth ${maxDepth}`,
      `Try increasing max depth (e.g. ${OPTIMAL_MAX_DEPTH} for optimal)`
    );
  } else if (search.solution.length === 0) {
    lines.push("Already solved!", "Solution: [] (0 moves)");
  } else {
    lines.push(
      `Solution: ${formatMoveSequence(search.solution)}`,
      `Moves: ${search.solution.length}`
    );
  }

  return { lines, search, validColors: hasValidColorCounts(state) };
}

function demoCase(title: string, scramble: string, maxDepth: number): string[] {
  const state = applyMoves(SOLVED_STATE, scramble);
  const { solution } = searchSolution(state, maxDepth);
  const found =
    solution === null
      ? "No solution found within depth limit"
      : solution.length === 0
        ? "Solution: [] (already solved)"
        : `Solution: ${formatMoveSequence(solution)} (${solution.length} moves)`;
  return [
    title,
    "-".repeat(60),
    `Input:    ${formatCube(state)}`,
    `Solving with max depth ${maxDepth}...`,
    found,
    "",
  ];
}

export function demoLines(): string[] {
  return [
    "=".repeat(60),
    " 2x2 Pocket Cube Solver",
    "=".repeat(60),
    "",
    ...demoCase("1. SOLVED CUBE", "", 8),
    ...demoCase("2. SIMPLE SCRAMBLE (F R)", "F R", 4),
    ...demoCase("3. MEDIUM SCRAMBLE (R U' F R2)", "R U' F R2", 7),
  ];
}

function fail(err: unknown, hint?: string): void {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  if (hint) console.error(hint);
  process.exitCode = 1;
}

export function registerCubeCommands(program: Command): void {
  program
    .command("scramble")
    .description("Generate a random scramble")
    .argument("[moves]", "Number of random moves (default from config)")
    .option("-s, --seed <seed>", "Seed for a reproducible scramble")
    .action((moves: string | undefined, opts: { seed?: string }) => {
      try {
        const length = parseCount(moves ?? getConfig().scrambleLength, "move count");
        const seed = opts.seed ?? randomSeed();
        log.debug({ length, seed }, "scrambling");
        console.log(scrambleLines(length, seed).join("\n"));
      } catch (err: unknown) {
        fail(err);
      }
    });

  program
    .command("apply")
    .description("Apply a move sequence to a cube")
    .argument("<cube>", "Cube as [F],[R],[B],[L],[U],[D] sticker groups")
    .argument("<moves>", `Moves such as "R U R' U'"`)
    .action((cube: string, moves: string) => {
      try {
        console.log(applyReport(cube, moves).lines.join("\n"));
      } catch (err: unknown) {
        fail(err, err instanceof InvalidMoveError ? VALID_MOVES_HINT : undefined);
      }
    });

  program
    .command("solve")
    .description("Find a shortest solution up to a search depth")
    .argument("<cube>", "Cube as [F],[R],[B],[L],[U],[D] sticker groups")
    .argument("[maxDepth]", "Maximum solution length (default from config)")
    .action((cube: string, maxDepth: string | undefined) => {
      try {
        const depth = parseCount(maxDepth ?? getConfig().maxDepth, "max depth");
        const started = Date.now();
        const report = solveReport(cube, depth);
        if (!report.validColors) {
          log.warn({ cube }, "cube does not hold six colours four times each; it cannot be solved");
        }
        log.info(
          {
            maxDepth: depth,
            expanded: report.search.expanded,
            visited: report.search.visited,
            elapsedMs: Date.now() - started,
          },
          "search finished"
        );
        console.log(report.lines.join("\n"));
      } catch (err: unknown) {
        fail(err);
      }
    });

  program
    .command("demo")
    .description("Solve a few sample scrambles")
    .action(() => {
      console.log(demoLines().join("\n"));
    });
}
