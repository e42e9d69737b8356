import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { load } from "js-yaml";
import { addSegment, buildSegment, initProject } from "../scaffold.ts";
import { loadOntology } from "../../ontology/loader.ts";
import { OntologyValidator } from "../../validator/ontology-validator.ts";
import { ScaffoldError } from "../../errors.ts";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "ontoc-scaffold-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("initProject", () => {
  test("creates a starter ontology that loads", async () => {
    const project = join(dir, "acme");
    const files = await initProject(project);

    expect(files).toEqual([
      join(project, "ontology", "customers", "segments.yaml"),
      join(project, "ontology", "marketing", "campaigns.yaml"),
      join(project, "ontoc.yaml"),
    ]);

    const ontology = await loadOntology(join(project, "ontology"));
    expect(ontology.listSegments()).toEqual(["EnterpriseCustomer"]);
    expect(ontology.listCampaigns()).toEqual(["ProductLaunchCampaign"]);
    expect(new OntologyValidator(ontology).validateAll()).toEqual([]);
  });

  test("refuses an existing directory", async () => {
    await expect(initProject(dir)).rejects.toThrow(ScaffoldError);
  });
});

describe("buildSegment", () => {
  test("turns options into type definitions", () => {
    expect(
      buildSegment({ companySize: "50-200", industry: "retail", annualRevenue: "1M, 10M" }),
    ).toEqual({
      properties: {
        company_size: 'enum["50-200"]',
        industry: 'enum["retail"]',
        annual_revenue: "range(1M, 10M)",
      },
    });
    expect(buildSegment({})).toEqual({ properties: {} });
  });

  test("rejects options that do not form a valid type", () => {
    expect(() => buildSegment({ annualRevenue: "10M" })).toThrow(
      "Invalid --annual-revenue: Range must have min and max values: range(10M)",
    );
  });
});

describe("addSegment", () => {
  test("creates the segments file when missing", async () => {
    const file = await addSegment(dir, "Startup", { industry: "saas" });
    expect(file).toBe(join(dir, "customers", "segments.yaml"));
    expect(load(await readFile(file, "utf-8"))).toEqual({
      segments: { Startup: { properties: { industry: 'enum["saas"]' } } },
    });
  });

  test("keeps existing segments and other sections", async () => {
    await mkdir(join(dir, "customers"));
    await writeFile(
      join(dir, "customers", "segments.yaml"),
      "segments:\n  Existing:\n    properties:\n      a: string\ntypes:\n  Money: range(0, 1M)\n",
    );

    await addSegment(dir, "Startup");

    const ontology = await loadOntology(dir);
    expect(ontology.listSegments()).toEqual(["Existing", "Startup"]);
    expect(ontology.getType("Money")).toBe("range(0, 1M)");
  });

  test("fails when the ontology directory is missing", async () => {
    const missing = join(dir, "nope");
    await expect(addSegment(missing, "Startup")).rejects.toThrow(
      `Ontology directory '${missing}' not found`,
    );
  });
});
