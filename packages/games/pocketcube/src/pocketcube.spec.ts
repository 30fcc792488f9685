import { strict as assert } from "assert";
import { GameConfig, GameState } from "@pocketsolve/core";
import { GameRegistry, MatchOrchestrator } from "@pocketsolve/engine";
import {
  SOLVED_STATE,
  PocketCubeData,
  parseCube,
  formatCube,
  hasValidColorCounts,
  isSolvedState,
  statesEqual,
} from "./state";
import {
  MOVE_ORDER,
  MOVES,
  MoveName,
  applyMove,
  applyPermutation,
  composePermutations,
  inverseMove,
  isMoveName,
} from "./moves";
import {
  parseMoveSequence,
  applyMoves,
  invertSequence,
  formatMoveSequence,
} from "./notation";
import { searchSolution, solveCube } from "./solver";
import { scrambleCube } from "./scramble";
import { SeededRng } from "./prng";
import { InvalidMoveError, MalformedCubeError } from "./errors";
import { PocketCubeModule } from "./rules";
import { PocketCubeUI } from "./ui";
import { turn } from "./actions";

const SOLVED_TEXT = "[w,w,w,w],[o,o,o,o],[y,y,y,y],[r,r,r,r],[b,b,b,b],[g,g,g,g]";
const BASE_MOVES: MoveName[] = ["F", "R", "B", "L", "U", "D"];

/** Every slot labelled with its own index, so any permutation is visible */
const LABELLED: readonly string[] = Array.from({ length: 24 }, (_, i) => `s${i}`);

/** Slot triples that make up the eight corner pieces */
const CORNERS = [
  [0, 13, 18], [1, 4, 19], [2, 15, 20], [3, 6, 21],
  [5, 8, 17], [7, 10, 23], [9, 12, 16], [11, 14, 22],
];

function repeat(state: readonly string[], move: MoveName, times: number): readonly string[] {
  let current = state;
  for (let i = 0; i < times; i++) current = applyMove(current, move);
  return current;
}

describe("Move model", () => {
  it("defines 18 distinct moves in face order", () => {
    assert.equal(MOVE_ORDER.length, 18);
    assert.equal(new Set(MOVE_ORDER).size, 18);
    assert.deepEqual(MOVE_ORDER.slice(0, 6), ["F", "F2", "F'", "R", "R2", "R'"]);
    assert.deepEqual(MOVE_ORDER.slice(15), ["D", "D2", "D'"]);
  });

  it("every permutation covers each slot exactly once", () => {
    for (const name of MOVE_ORDER) {
      const sorted = [...MOVES[name].permutation].sort((a, b) => a - b);
      assert.deepEqual(sorted, Array.from({ length: 24 }, (_, i) => i), name);
    }
  });

  it("four quarter turns return any state to itself", () => {
    const scrambled = applyMoves(LABELLED, "R U' F2 L D B'");
    for (const move of BASE_MOVES) {
      assert.deepEqual(repeat(LABELLED, move, 4), LABELLED, move);
      assert.deepEqual(repeat(scrambled, move, 4), scrambled, move);
      assert.notDeepEqual(repeat(LABELLED, move, 2), LABELLED, move);
    }
  });

  it("double and inverse turns equal two and three quarter turns", () => {
    for (const move of BASE_MOVES) {
      assert.deepEqual(applyMove(LABELLED, `${move}2`), repeat(LABELLED, move, 2));
      assert.deepEqual(applyMove(LABELLED, `${move}'`), repeat(LABELLED, move, 3));
    }
  });

  it("every move is undone by its inverse in either order", () => {
    for (const move of MOVE_ORDER) {
      const inverse = inverseMove(move);
      assert.deepEqual(applyMove(applyMove(LABELLED, move), inverse), LABELLED, move);
      assert.deepEqual(applyMove(applyMove(LABELLED, inverse), move), LABELLED, move);
    }
    assert.equal(inverseMove("F"), "F'");
    assert.equal(inverseMove("F'"), "F");
    assert.equal(inverseMove("U2"), "U2");
  });

  it("opposite faces commute", () => {
    for (const [a, b] of [["F", "B"], ["R", "L"], ["U", "D"]] as const) {
      assert.deepEqual(
        applyMove(applyMove(LABELLED, a), b),
        applyMove(applyMove(LABELLED, b), a),
        `${a}/${b}`
      );
    }
  });

  it("keeps the three stickers of each corner together", () => {
    const cornerKeys = new Set(CORNERS.map((c) => [...c].sort((x, y) => x - y).join(",")));
    for (const move of BASE_MOVES) {
      const permutation = MOVES[move].permutation;
      for (const corner of CORNERS) {
        const sources = corner.map((slot) => permutation[slot]).sort((x, y) => x - y);
        assert.ok(cornerKeys.has(sources.join(",")), `${move} splits corner ${corner}`);
      }
    }
  });

  it("turns faces clockwise as seen from outside", () => {
    assert.equal(
      formatCube(applyMove(SOLVED_STATE, "F")),
      "[w,w,w,w],[b,o,b,o],[y,y,y,y],[r,g,r,g],[b,b,r,r],[o,o,g,g]"
    );
    assert.equal(
      formatCube(applyMove(SOLVED_STATE, "R")),
      "[w,g,w,g],[o,o,o,o],[b,y,b,y],[r,r,r,r],[b,w,b,w],[g,y,g,y]"
    );
    assert.equal(
      formatCube(applyMove(SOLVED_STATE, "U")),
      "[o,o,w,w],[y,y,o,o],[r,r,y,y],[w,w,r,r],[b,b,b,b],[g,g,g,g]"
    );
  });

  it("never changes colour counts", () => {
    let state = SOLVED_STATE;
    for (const move of MOVE_ORDER) {
      state = applyMove(state, move);
      assert.equal(hasValidColorCounts(state), true, move);
    }
  });

  it("does not mutate the input state", () => {
    const input = [...SOLVED_STATE];
    applyMove(input, "R");
    assert.deepEqual(input, SOLVED_STATE);
  });

  it("rejects unknown move names", () => {
    for (const bad of ["X", "f", "R3", "", "R''"]) {
      assert.throws(
        () => applyMove(SOLVED_STATE, bad),
        (err: unknown) => err instanceof InvalidMoveError && err.move === bad
      );
    }
    assert.equal(isMoveName("L'"), true);
    assert.equal(isMoveName("l"), false);
  });

  it("applyPermutation matches applyMove and composes", () => {
    const r = MOVES.R.permutation;
    assert.deepEqual(applyPermutation(LABELLED, r), applyMove(LABELLED, "R"));
    assert.deepEqual(
      applyPermutation(LABELLED, composePermutations(r, MOVES.U.permutation)),
      applyMove(applyMove(LABELLED, "R"), "U")
    );
  });
});

describe("Cube text format", () => {
  it("parses the solved cube", () => {
    assert.deepEqual(parseCube(SOLVED_TEXT), SOLVED_STATE);
    assert.equal(isSolvedState(parseCube(SOLVED_TEXT)), true);
  });

  it("round-trips with whitespace normalised", () => {
    const text = "[o, y,y,y], [g,b,g,g],[w,w,o,o],[r,r,r,y],[b,b,w,o],[g, r,g,w]";
    assert.equal(
      formatCube(parseCube(text)),
      "[o,y,y,y],[g,b,g,g],[w,w,o,o],[r,r,r,y],[b,b,w,o],[g,r,g,w]"
    );
    const scrambled = formatCube(applyMoves(SOLVED_STATE, "R U F'"));
    assert.equal(formatCube(parseCube(scrambled)), scrambled);
  });

  it("rejects input that is not 24 stickers", () => {
    assert.throws(
      () => parseCube("[w,w,w,w],[o,o,o,o],[y,y,y,y],[r,r,r,r],[b,b,b,b],[g,g,g]"),
      (err: unknown) =>
        err instanceof MalformedCubeError &&
        err.stickerCount === 23 &&
        err.message === "Expected 24 stickers, got 23"
    );
    assert.throws(() => parseCube(""), /Expected 24 stickers, got 1/);
  });

  it("checks colour counts", () => {
    assert.equal(hasValidColorCounts(SOLVED_STATE), true);
    const wrong = [...SOLVED_STATE];
    wrong[0] = "o";
    assert.equal(hasValidColorCounts(wrong), false);
  });
});

describe("Move notation", () => {
  it("splits on whitespace and after apostrophes", () => {
    assert.deepEqual(parseMoveSequence("R U R' U'"), ["R", "U", "R'", "U'"]);
    assert.deepEqual(parseMoveSequence("R'U2  F"), ["R'", "U2", "F"]);
    assert.deepEqual(parseMoveSequence("   "), []);
  });

  it("rejects unknown tokens", () => {
    assert.throws(() => parseMoveSequence("R X"), /Invalid move: X/);
    assert.throws(() => parseMoveSequence("RU"), /Invalid move: RU/);
  });

  it("inverts a sequence", () => {
    assert.deepEqual(invertSequence(["R", "U2", "F'"]), ["F", "U2", "R'"]);
    assert.equal(formatMoveSequence(["R", "U2", "F'"]), "R U2 F'");
  });

  it("a sequence followed by its inverse leaves the cube solved", () => {
    const moves = parseMoveSequence("R U' F2 L D B' U2 R'");
    const scrambled = applyMoves(SOLVED_STATE, moves);
    assert.equal(isSolvedState(scrambled), false);
    assert.deepEqual(applyMoves(scrambled, invertSequence(moves)), SOLVED_STATE);
  });
});

describe("Solver", () => {
  it("returns an empty solution for the solved cube at any depth", () => {
    assert.deepEqual(solveCube(SOLVED_STATE, 0), []);
    assert.deepEqual(solveCube(SOLVED_STATE, 5), []);
    assert.deepEqual(searchSolution(SOLVED_STATE, 3), { solution: [], expanded: 0, visited: 1 });
  });

  it("undoes a single move", () => {
    const scrambled = applyMove(SOLVED_STATE, "R");
    assert.deepEqual(searchSolution(scrambled, 1), { solution: ["R'"], expanded: 1, visited: 6 });
    assert.deepEqual(solveCube(scrambled, 4), ["R'"]);
  });

  it("finds a two-move solution that solves the cube", () => {
    const scrambled = applyMoves(SOLVED_STATE, "F R");
    const result = searchSolution(scrambled, 2);
    assert.ok(result.solution);
    assert.equal(result.solution.length, 2);
    assert.equal(isSolvedState(applyMoves(scrambled, result.solution)), true);
    assert.deepEqual(result, { solution: ["R'", "F'"], expanded: 7, visited: 96 });
  });

  it("finds the four-move demo solution", () => {
    const scrambled = applyMoves(SOLVED_STATE, "R U' F R2");
    const solution = solveCube(scrambled, 4);
    assert.deepEqual(solution, ["R2", "F'", "U", "R'"]);
  });

  it("returns null when the depth bound is too small", () => {
    const scrambled = applyMoves(SOLVED_STATE, "F R U");
    assert.equal(solveCube(scrambled, 2), null);
    assert.deepEqual(solveCube(scrambled, 3), ["U'", "R'", "F'"]);
  });

  it("does not expand anything at depth 0", () => {
    const scrambled = applyMove(SOLVED_STATE, "R");
    assert.deepEqual(searchSolution(scrambled, 0), { solution: null, expanded: 0, visited: 1 });
  });

  it("counts each distinct neighbour once", () => {
    const scrambled = applyMoves(SOLVED_STATE, "F R");
    assert.deepEqual(searchSolution(scrambled, 1), { solution: null, expanded: 1, visited: 19 });
  });

  it("reports no solution for an impossible cube", () => {
    const swapped = [...SOLVED_STATE];
    [swapped[0], swapped[4]] = [swapped[4], swapped[0]];
    assert.equal(solveCube(swapped, 3), null);
  });

  it("is deterministic", () => {
    const scrambled = applyMoves(SOLVED_STATE, "L D' B2");
    assert.deepEqual(solveCube(scrambled, 3), solveCube(scrambled, 3));
  });

  it("rejects a negative or fractional depth", () => {
    assert.throws(() => solveCube(SOLVED_STATE, -1), RangeError);
    assert.throws(() => solveCube(SOLVED_STATE, 1.5), RangeError);
  });
});

describe("Scrambler", () => {
  it("is deterministic for a seed", () => {
    const a = scrambleCube(12, new SeededRng("scramble-seed"));
    const b = scrambleCube(12, new SeededRng("scramble-seed"));
    assert.deepEqual(a, b);
    assert.equal(a.moves.length, 12);
  });

  it("produces the state its moves describe", () => {
    const { state, moves } = scrambleCube(20, new SeededRng("replay"));
    assert.deepEqual(state, applyMoves(SOLVED_STATE, moves));
    assert.equal(hasValidColorCounts(state), true);
    assert.ok(moves.every(isMoveName));
  });

  it("different seeds give different scrambles", () => {
    const a = scrambleCube(20, new SeededRng("seed-a"));
    const b = scrambleCube(20, new SeededRng("seed-b"));
    assert.notDeepEqual(a.moves, b.moves);
  });

  it("an empty scramble is solved", () => {
    assert.deepEqual(scrambleCube(0, new SeededRng("x")), { state: SOLVED_STATE, moves: [] });
    assert.throws(() => scrambleCube(-1, new SeededRng("x")), RangeError);
  });

  it("SeededRng.pick rejects an empty list", () => {
    assert.throws(() => new SeededRng("x").pick([]), RangeError);
  });
});

describe("PocketCubeModule", () => {
  const SOLVER = "solver-1";
  const CONFIG: GameConfig = { gameId: "pocketcube", version: "0.1.0" };

  function stateFrom(moves: string): GameState<PocketCubeData> {
    return {
      gameId: "pocketcube",
      players: [SOLVER],
      currentPlayer: SOLVER,
      turnNumber: 0,
      data: {
        cube: applyMoves(SOLVED_STATE, moves),
        scramble: parseMoveSequence(moves),
        history: [],
        resigned: false,
      },
    };
  }

  describe("init", () => {
    it("scrambles the cube from the seed", () => {
      const state = PocketCubeModule.init(CONFIG, [SOLVER], "seed");
      assert.equal(state.currentPlayer, SOLVER);
      assert.equal(state.turnNumber, 0);
      assert.equal(state.data.scramble.length, 8);
      assert.deepEqual(state.data.cube, applyMoves(SOLVED_STATE, state.data.scramble));
      assert.deepEqual(state.data.history, []);
      assert.equal(state.data.resigned, false);

      const again = PocketCubeModule.init(CONFIG, [SOLVER], "seed");
      assert.deepEqual(again.data, state.data);
    });

    it("honours scrambleLength", () => {
      const state = PocketCubeModule.init(
        { ...CONFIG, settings: { scrambleLength: 3 } },
        [SOLVER],
        "seed"
      );
      assert.equal(state.data.scramble.length, 3);
    });

    it("rejects a bad scrambleLength", () => {
      for (const scrambleLength of [0, 51, 2.5, "5"]) {
        assert.throws(
          () => PocketCubeModule.init({ ...CONFIG, settings: { scrambleLength } }, [SOLVER], "s"),
          /Invalid scrambleLength/
        );
      }
    });

    it("requires exactly one player", () => {
      assert.throws(
        () => PocketCubeModule.init(CONFIG, [SOLVER, "solver-2"], "seed"),
        /exactly 1 player/
      );
    });
  });

  describe("actions", () => {
    it("validates turns and resign", () => {
      const state = stateFrom("R U");
      assert.equal(PocketCubeModule.validateAction(state, SOLVER, turn("U'")), true);
      assert.equal(PocketCubeModule.validateAction(state, SOLVER, { type: "resign", data: {} }), true);
      assert.equal(
        PocketCubeModule.validateAction(state, SOLVER, { type: "turn", data: { move: "X" } }),
        false
      );
      assert.equal(PocketCubeModule.validateAction(state, "someone-else", turn("U'")), false);
    });

    it("applies turns without mutating the previous state", () => {
      const state = stateFrom("R U");
      const next = PocketCubeModule.applyAction(state, SOLVER, turn("U'"));
      assert.deepEqual(next.data.history, ["U'"]);
      assert.equal(next.turnNumber, 1);
      assert.deepEqual(next.data.cube, applyMove(SOLVED_STATE, "R"));
      assert.deepEqual(state.data.history, []);
      assert.deepEqual(state.data.cube, applyMoves(SOLVED_STATE, "R U"));
    });

    it("finishes when the cube is solved", () => {
      let state = stateFrom("R U");
      state = PocketCubeModule.applyAction(state, SOLVER, turn("U'"));
      assert.equal(PocketCubeModule.isTerminal(state), false);
      assert.equal(PocketCubeModule.getOutcome(state).reason, "game_in_progress");

      state = PocketCubeModule.applyAction(state, SOLVER, turn("R'"));
      assert.equal(PocketCubeModule.isTerminal(state), true);
      assert.deepEqual(PocketCubeModule.getOutcome(state), {
        winner: SOLVER,
        draw: false,
        scores: { [SOLVER]: 1 },
        reason: "puzzle_solved",
      });
      assert.equal(PocketCubeModule.validateAction(state, SOLVER, turn("R")), false);
      assert.deepEqual(PocketCubeModule.getLegalActions(state, SOLVER), []);
    });

    it("finishes on resign", () => {
      const state = PocketCubeModule.applyAction(stateFrom("R"), SOLVER, { type: "resign", data: {} });
      assert.equal(PocketCubeModule.isTerminal(state), true);
      assert.equal(PocketCubeModule.getOutcome(state).reason, "resigned");
      assert.equal(PocketCubeModule.getOutcome(state).winner, null);
      assert.equal(PocketCubeModule.validateAction(state, SOLVER, turn("R'")), false);
    });

    it("throws on unknown action types", () => {
      assert.throws(
        () => PocketCubeModule.applyAction(stateFrom("R"), SOLVER, { type: "jump", data: {} }),
        /Invalid action type/
      );
    });

    it("lists all 18 turns and resign", () => {
      const actions = PocketCubeModule.getLegalActions(stateFrom("R"), SOLVER);
      assert.equal(actions.length, 19);
      assert.deepEqual(actions[0], { type: "turn", data: { move: "F" } });
      assert.deepEqual(actions[18], { type: "resign", data: {} });
      assert.deepEqual(PocketCubeModule.getLegalActions(stateFrom("R"), "someone-else"), []);
    });
  });

  describe("observation", () => {
    it("hides the scramble", () => {
      const state = PocketCubeModule.applyAction(stateFrom("R U"), SOLVER, turn("U'"));
      const obs = PocketCubeModule.getObservation(state, SOLVER);
      assert.equal("scramble" in obs.publicData, false);
      assert.deepEqual(obs.publicData.history, ["U'"]);
      assert.equal(obs.publicData.moveCount, 1);
      assert.equal(obs.publicData.solved, false);
      assert.equal(obs.turnNumber, 1);
    });
  });

  describe("with MatchOrchestrator", () => {
    it("is solved by replaying the inverted scramble", () => {
      const registry = new GameRegistry();
      registry.register(PocketCubeModule);
      assert.equal(registry.has("pocketcube"), true);

      const orch = new MatchOrchestrator({
        game: PocketCubeModule,
        players: [SOLVER],
        matchId: "cube-match-1",
        rngSeed: "orchestrated",
        settings: { scrambleLength: 6 },
      });

      for (const move of invertSequence(orch.getState().data.scramble)) {
        if (orch.isTerminal()) break;
        orch.submitAction(SOLVER, turn(move));
      }

      assert.equal(orch.isTerminal(), true);
      assert.equal(orch.getOutcome().reason, "puzzle_solved");
      assert.equal(isSolvedState(orch.getState().data.cube), true);
      assert.equal(orch.getTranscript().length, orch.getState().data.history.length);
    });

    it("agrees with the solver on a short scramble", () => {
      const orch = new MatchOrchestrator({
        game: PocketCubeModule,
        players: [SOLVER],
        matchId: "cube-match-2",
        rngSeed: "solver-check",
        settings: { scrambleLength: 3 },
      });

      const solution = solveCube(orch.getState().data.cube, 3);
      assert.ok(solution);
      for (const move of solution) {
        orch.submitAction(SOLVER, turn(move));
      }
      assert.equal(orch.isTerminal(), true);
      assert.ok(statesEqual(orch.getState().data.cube, SOLVED_STATE));
    });
  });

  describe("ui", () => {
    it("renders the solved cube as a net", () => {
      const obs = PocketCubeModule.getObservation(stateFrom(""), SOLVER);
      assert.equal(
        PocketCubeUI.renderBoard(obs.publicData),
        [
          "    b b",
          "    b b",
          "r r w w o o y y",
          "r r w w o o y y",
          "    g g",
          "    g g",
        ].join("\n")
      );
    });

    it("renders a turned cube", () => {
      const obs = PocketCubeModule.getObservation(stateFrom("R"), SOLVER);
      assert.equal(
        PocketCubeUI.renderBoard(obs.publicData),
        [
          "    b w",
          "    b w",
          "r r w g o o b y",
          "r r w g o o b y",
          "    g y",
          "    g y",
        ].join("\n")
      );
    });

    it("falls back when there is no cube", () => {
      assert.equal(PocketCubeUI.renderBoard({}), "Waiting for game state...");
    });

    it("parses moves and resign", () => {
      assert.deepEqual(PocketCubeUI.parseInput(" r' ", {}), { type: "turn", data: { move: "R'" } });
      assert.deepEqual(PocketCubeUI.parseInput("U2", {}), { type: "turn", data: { move: "U2" } });
      assert.deepEqual(PocketCubeUI.parseInput("Resign", {}), { type: "resign", data: {} });
      assert.equal(PocketCubeUI.parseInput("x", {}), null);
      assert.equal(PocketCubeUI.parseInput("", {}), null);
    });

    it("formats actions and status", () => {
      assert.equal(PocketCubeUI.formatAction(turn("D2")), "D2");
      assert.equal(PocketCubeUI.formatAction({ type: "resign", data: {} }), "resign");
      assert.equal(PocketCubeUI.renderStatus({ solved: true, moveCount: 1 }), "Solved in 1 move");
      assert.equal(PocketCubeUI.renderStatus({ solved: false, moveCount: 3 }), "3 moves made");
      assert.equal(PocketCubeUI.renderStatus({ resigned: true }), "You resigned.");
      assert.equal(PocketCubeUI.renderStatus({ moveCount: 0 }), null);
    });
  });
});
