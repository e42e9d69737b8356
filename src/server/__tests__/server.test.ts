import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createOntologyServer } from "../server.ts";
import { SUMMARY_URI } from "../resources.ts";
import { parseOntologyDocument } from "../../ontology/loader.ts";

const ontology = parseOntologyDocument(
  `
segments:
  EnterpriseCustomer:
    properties:
      companySize: enum["1000-5000", "5000+"]
      annualRevenue: range(10M, 1B+)
    constraints:
      - Healthcare companies require HIPAA compliance
campaigns:
  LaunchCampaign:
    metadata:
      owner_team: marketing
      campaign_type: launch
      target_audience: [EnterpriseCustomer]
    components:
      email: {}
`,
  "test.yaml",
);

let client: Client;

beforeEach(async () => {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const server = createOntologyServer(ontology);
  client = new Client({ name: "ontoc-test", version: "0.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterEach(async () => {
  await client.close();
});

async function callTool(
  name: string,
  args: Record<string, unknown> = {},
): Promise<{ isError: boolean; body: unknown }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== "text") throw new Error(`Tool ${name} returned no text content`);
  return { isError: result.isError === true, body: JSON.parse(first.text) };
}

describe("ontology MCP server", () => {
  test("registers the ontology tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "compile_json_schema",
      "inspect_segment",
      "list_campaigns",
      "list_segments",
      "validate_ontology",
      "validate_record",
    ]);
  });

  test("list_segments and list_campaigns summarize the ontology", async () => {
    expect((await callTool("list_segments")).body).toEqual([
      { name: "EnterpriseCustomer", properties: 2, constraints: 1 },
    ]);
    expect((await callTool("list_campaigns")).body).toEqual([
      { name: "LaunchCampaign", owner_team: "marketing", campaign_type: "launch", components: 1 },
    ]);
  });

  test("inspect_segment returns parsed property types", async () => {
    const { body } = await callTool("inspect_segment", { name: "EnterpriseCustomer" });
    expect(body).toEqual({
      name: "EnterpriseCustomer",
      properties: [
        {
          name: "companySize",
          declared: 'enum["1000-5000", "5000+"]',
          canonical: 'enum["1000-5000", "5000+"]',
          kind: "enum",
        },
        {
          name: "annualRevenue",
          declared: "range(10M, 1B+)",
          canonical: "range(10M, 1B+)",
          kind: "range",
        },
      ],
      constraints: ["Healthcare companies require HIPAA compliance"],
      journeyStages: [],
    });
  });

  test("inspect_segment marks a property whose type does not parse", async () => {
    const growth = parseOntologyDocument(
      `
segments:
  GrowthStartup:
    properties:
      growthRate: range(0%, 500%)
`,
      "growth.yaml",
    );
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const growthClient = new Client({ name: "ontoc-test", version: "0.0.0" });
    await Promise.all([
      createOntologyServer(growth).connect(serverTransport),
      growthClient.connect(clientTransport),
    ]);

    const result = CallToolResultSchema.parse(
      await growthClient.callTool({ name: "inspect_segment", arguments: { name: "GrowthStartup" } }),
    );
    await growthClient.close();

    const first = result.content[0];
    expect(result.isError).not.toBe(true);
    expect(first?.type === "text" && JSON.parse(first.text)).toMatchObject({
      properties: [
        { name: "growthRate", declared: "range(0%, 500%)", canonical: "range(0%, 500%)", kind: "invalid" },
      ],
    });
  });

  test("inspect_segment reports an unknown segment as a tool error", async () => {
    const result = await callTool("inspect_segment", { name: "Nope" });
    expect(result).toEqual({
      isError: true,
      body: { error: { code: "NOT_FOUND", message: "Segment 'Nope' not found" } },
    });
  });

  test("validate_ontology returns the summary", async () => {
    const { body } = await callTool("validate_ontology");
    expect(body).toEqual({
      summary: { total_errors: 0, errors: 0, warnings: 0, info: 0, is_valid: true },
      findings: [],
    });
  });

  test("validate_record checks data against a segment", async () => {
    const { body } = await callTool("validate_record", {
      segment: "EnterpriseCustomer",
      data: { companySize: "5000+", annualRevenue: 5, region: "EU" },
    });
    expect(body).toEqual({
      valid: false,
      findings: [
        {
          message: "Value 5 not in range [10M, 1B+]",
          severity: "error",
          location: "data.annualRevenue",
        },
        {
          message: "Unknown property: region",
          severity: "warning",
          location: "data.EnterpriseCustomer",
        },
      ],
    });
  });

  test("compile_json_schema compiles one segment or all", async () => {
    const scoped = await callTool("compile_json_schema", { segment: "EnterpriseCustomer" });
    expect(scoped.body).toMatchObject({ title: "EnterpriseCustomer Schema" });

    const all = await callTool("compile_json_schema");
    expect(all.body).toMatchObject({
      title: "Business Ontology Schema",
      properties: { EnterpriseCustomer: { type: "object" } },
    });
  });

  test("exposes the ontology summary resource", async () => {
    const { contents } = await client.readResource({ uri: SUMMARY_URI });
    const text = contents[0] && "text" in contents[0] ? contents[0].text : "";
    expect(JSON.parse(String(text))).toMatchObject({
      segments: ["EnterpriseCustomer"],
      campaigns: ["LaunchCampaign"],
      leadScoring: null,
      validation: { is_valid: true },
    });
  });
});
