import { afterEach, beforeEach, describe, expect, test, vi, type MockInstance } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { runCli } from "../run.ts";
import { parseArgs, splitList, UsageError } from "../args.ts";

let dir: string;
let stdout: MockInstance<typeof console.log>;
let stderr: MockInstance<typeof console.error>;

function printed(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map((call) => call.map(String).join(" "));
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "ontoc-cli-"));
  stdout = vi.spyOn(console, "log").mockImplementation(() => {});
  stderr = vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

async function initAcme(): Promise<string> {
  expect(await runCli(["init", "acme"], { cwd: dir })).toBe(0);
  return join(dir, "acme");
}

describe("runCli", () => {
  test("prints the version", async () => {
    expect(await runCli(["version"], { cwd: dir })).toBe(0);
    expect(printed(stdout)).toEqual(["ontoc v0.1.0"]);
  });

  test("prints usage for help and for no command", async () => {
    expect(await runCli([], { cwd: dir })).toBe(0);
    expect(printed(stdout)[0]?.split("\n")[0]).toBe("ontoc v0.1.0 — business ontology compiler");
  });

  test("fails on an unknown command", async () => {
    expect(await runCli(["deploy"], { cwd: dir })).toBe(1);
    expect(printed(stderr)).toEqual(["Error: Unknown command 'deploy'"]);
  });

  test("fails on an unknown option", async () => {
    expect(await runCli(["validate", "--strict"], { cwd: dir })).toBe(1);
    expect(printed(stderr)[0]).toBe("Error: Unknown option '--strict'");
  });

  test("init then validate succeeds inside the project", async () => {
    const project = await initAcme();
    stdout.mockClear();

    expect(await runCli(["validate"], { cwd: project })).toBe(0);
    expect(printed(stdout)).toEqual(["✅ Ontology is valid!"]);
  });

  test("validate exits 1 on error findings", async () => {
    await writeFile(join(dir, "bad.yaml"), "segments:\n  bad:\n    properties:\n      a: string\n");

    expect(await runCli(["validate", "bad.yaml"], { cwd: dir })).toBe(1);
    expect(printed(stdout)).toEqual([
      "ERROR at segments.bad: Segment name 'bad' should be PascalCase",
      "",
      "1 error(s), 0 warning(s), 0 info",
    ]);
  });

  test("validate exits 1 when the path is missing", async () => {
    expect(await runCli(["validate", "missing"], { cwd: dir })).toBe(1);
    expect(printed(stderr)).toEqual([`Error: Ontology path '${join(dir, "missing")}' not found`]);
  });

  test("compile uses the configured targets and output directory", async () => {
    const project = await initAcme();

    expect(await runCli(["compile"], { cwd: project })).toBe(0);
    const models = await readFile(join(project, "generated", "pydantic", "models.py"), "utf-8");
    expect(models).toContain("class EnterpriseCustomer(BaseModel):");
    expect(printed(stdout).at(-1)).toBe(`✅ Compiled 2 file(s) to ${join(project, "generated")}`);
  });

  test("compile honours --target, --output and --segment", async () => {
    const project = await initAcme();

    const code = await runCli(
      ["compile", "ontology", "-t", "json-schema,bogus", "--output=out", "--segment", "EnterpriseCustomer"],
      { cwd: project },
    );

    expect(code).toBe(0);
    const schema = JSON.parse(await readFile(join(project, "out", "json-schema", "schema.json"), "utf-8"));
    expect(schema.title).toBe("EnterpriseCustomer Schema");
    expect(printed(stderr)).toEqual(["Warning: Unknown target format 'bogus'"]);
  });

  test("compile exits 1 for an unknown segment", async () => {
    const project = await initAcme();

    expect(await runCli(["compile", "--target", "typescript", "--segment", "Nope"], { cwd: project })).toBe(1);
    expect(printed(stderr)).toEqual(["Error compiling typescript: Segment 'Nope' not found"]);
  });

  test("lists segments and campaigns", async () => {
    const project = await initAcme();
    stdout.mockClear();

    expect(await runCli(["list-segments"], { cwd: project })).toBe(0);
    expect(printed(stdout)[2]).toBe(`EnterpriseCustomer  3${" ".repeat(11)}2`);

    stdout.mockClear();
    expect(await runCli(["list-campaigns"], { cwd: project })).toBe(0);
    expect(printed(stdout)[2]).toMatch(/^ProductLaunchCampaign\s+product_marketing\s+product_launch\s+1$/);
  });

  test("add-segment writes into the configured ontology", async () => {
    const project = await initAcme();

    const code = await runCli(
      ["add-segment", "MidMarket", "--company-size", "200-1000", "--annual-revenue", "10M, 100M"],
      { cwd: project },
    );
    expect(code).toBe(0);
    expect(printed(stdout).at(-1)).toBe("✅ Segment 'MidMarket' added to ontology");

    stdout.mockClear();
    expect(await runCli(["list-segments"], { cwd: project })).toBe(0);
    expect(printed(stdout)[3]).toMatch(/^MidMarket\s+2\s+0$/);
  });

  test("init refuses an existing directory", async () => {
    await initAcme();
    expect(await runCli(["init", "acme"], { cwd: dir })).toBe(1);
    expect(printed(stderr)).toEqual([`Error: Project directory '${join(dir, "acme")}' already exists`]);
  });
});

describe("parseArgs", () => {
  test("separates positionals from options", () => {
    const parsed = parseArgs(["path", "--target", "a,b", "-o", "out", "--segment=X"], [
      "target",
      "output",
      "segment",
    ]);
    expect(parsed.positionals).toEqual(["path"]);
    expect(Object.fromEntries(parsed.options)).toEqual({ target: "a,b", output: "out", segment: "X" });
  });

  test("requires option values", () => {
    expect(() => parseArgs(["--target"], ["target"])).toThrow(UsageError);
  });

  test("splitList trims and drops blanks", () => {
    expect(splitList(" a, b ,,c ")).toEqual(["a", "b", "c"]);
  });
});
