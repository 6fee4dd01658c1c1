/**
 * @fileoverview Unit tests for the command-line entry point.
 *
 * Exercises argument parsing and output rendering without touching
 * stdout; run() is only driven down its error paths.
 */

import { expect } from "chai";
import { parseArgs, renderOutput, run } from "../../src/main";
import { ConfigError, StructuralError } from "../../src/errors";
import { getLogLevel, setLogLevel } from "../../src/utils";

const FARM = "2\n##start\ns 0 0\n##end\ne 4 0\nm 2 0\ns-m\nm-e\n";

async function runError(args: string[]): Promise<unknown> {
  try {
    await run(args);
  } catch (e) {
    return e;
  }
  throw new Error("Expected run to reject");
}

describe("main", () => {
  afterEach(() => {
    setLogLevel("warn");
  });

  describe("parseArgs()", () => {
    it("should collect the file and flags", () => {
      const options = parseArgs(["farm.txt", "--strategy", "per-neighbor", "--max-routes", "5", "--all-routes", "--moves-only"]);

      expect(options.file).to.equal("farm.txt");
      expect(options.movesOnly).to.be.true;
      expect(options.echoInput).to.be.false;
      expect(options.overrides).to.deep.equal({
        strategy: "per-neighbor",
        maxCandidateRoutes: 5,
        enumerateAllRoutes: true,
      });
    });

    it("should map verbosity flags to log levels", () => {
      expect(parseArgs(["--verbose"]).overrides).to.deep.equal({ logLevel: "info" });
      expect(parseArgs(["--debug"]).overrides).to.deep.equal({ logLevel: "debug" });
    });

    it("should recognize help", () => {
      expect(parseArgs(["-h"]).help).to.be.true;
      expect(parseArgs(["--help"]).file).to.be.null;
    });

    it("should require a value after --strategy", () => {
      expect(() => parseArgs(["--strategy", "--moves-only"])).to.throw(ConfigError, "--strategy requires a value");
      expect(() => parseArgs(["--max-routes"])).to.throw(ConfigError, "--max-routes requires a value");
    });

    it("should reject unknown options and extra files", () => {
      expect(() => parseArgs(["--fast"])).to.throw(ConfigError, "Unknown option: --fast");
      expect(() => parseArgs(["a.txt", "b.txt"])).to.throw(ConfigError, "Only one input file is accepted");
    });

    it("should leave a non-numeric route cap for validation", () => {
      expect(parseArgs(["--max-routes", "many"]).overrides).to.deep.equal({ maxCandidateRoutes: "many" });
    });
  });

  describe("renderOutput()", () => {
    it("should print only the move lines", () => {
      const output = renderOutput(FARM, { movesOnly: true, echoInput: false, overrides: {} });
      expect(output).to.equal("L1-m\nL1-e L2-m\nL2-e");
    });

    it("should echo the input before the moves", () => {
      const output = renderOutput(FARM, { movesOnly: false, echoInput: true, overrides: {} });
      expect(output).to.equal(
        "2\n##start\ns 0 0\n##end\ne 4 0\nm 2 0\ns-m\nm-e\n\nL1-m\nL1-e L2-m\nL2-e"
      );
    });

    it("should end the full report with the summary", () => {
      const lines = renderOutput(FARM, { movesOnly: false, echoInput: false, overrides: {} }).split("\n");
      expect(lines[0]).to.equal("All routes found:");
      expect(lines[lines.length - 1]).to.equal("Turns: 3 (lower bound: 3, efficiency: 100.0%)");
    });

    it("should apply the configured log level", () => {
      renderOutput(FARM, { movesOnly: true, echoInput: false, overrides: {} }, { FARM_LOG_LEVEL: "silent" });
      expect(getLogLevel()).to.equal("silent");
    });

    it("should propagate structural errors", () => {
      expect(() => renderOutput("0\n", { movesOnly: true, echoInput: false, overrides: {} }))
        .to.throw(StructuralError)
        .with.property("code", "INVALID_AGENT_COUNT");
    });

    it("should reject invalid configuration before loading", () => {
      expect(() =>
        renderOutput(FARM, { movesOnly: true, echoInput: false, overrides: { strategy: "fastest" } })
      ).to.throw(ConfigError);
    });
  });

  describe("run()", () => {
    it("should require an input file", async () => {
      const error = await runError([]);
      expect(error).to.be.instanceOf(ConfigError);
    });

    it("should report an unreadable file", async () => {
      const error = await runError(["does-not-exist.txt"]);
      expect(error).to.be.instanceOf(ConfigError);
      expect(error).to.have.property("message").that.matches(/^Cannot read does-not-exist\.txt: /);
    });
  });
});
