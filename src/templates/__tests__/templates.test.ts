import { describe, expect, test } from "vitest";
import { renderTypeScriptInterfaces } from "../typescript-interfaces.ts";
import { pyLiteral, renderPydanticModels } from "../pydantic-model.ts";
import { renderSalesforceObject, renderSalesforceValidation } from "../salesforce.ts";
import { renderHubspotProperties } from "../hubspot-properties.ts";
import { renderOntologyDocs, renderSegmentDocs } from "../docs.ts";
import { createTemplateRenderer } from "../renderer.ts";
import { escapeXml, mdCell } from "../text.ts";
import { fieldBinding, ontologyBindings, segmentBinding } from "../../compiler/bindings.ts";
import { parseOntologyDocument } from "../../ontology/loader.ts";
import type { SegmentBinding } from "../../types/bindings.ts";

const ontology = parseOntologyDocument(
  `
segments:
  EnterpriseCustomer:
    description: Large companies
    properties:
      companySize: enum["1000-5000", "5000+"]
      annualRevenue: range(10M, 1B+)
      score: int(0, 100)
    constraints:
      - Healthcare companies require HIPAA compliance
  SmallBusiness:
    properties:
      companySize: enum["1-10", "11-50"]
      founded: datetime
types:
  Address:
    description: Postal address
    properties:
      city: string
  Money: range(0, 1M)
lead_scoring:
  name: DefaultScoring
  inputs:
    companySize: string
  output:
    score: int(0, 100)
  weights:
    companySize: 0.4
  thresholds:
    hot: 80
`,
  "test.yaml",
);

function segment(name: string): SegmentBinding {
  return segmentBinding(ontology.requireSegment(name));
}

describe("typescript-interfaces", () => {
  test("renders one segment", () => {
    expect(renderTypeScriptInterfaces({ scope: "segment", segment: segment("SmallBusiness") })).toBe(
      [
        "// Generated from the business ontology. Do not edit by hand.",
        "",
        "export interface SmallBusiness {",
        '  companySize: "1-10" | "11-50";',
        "  founded: string;",
        "}",
        "",
      ].join("\n"),
    );
  });

  test("documents segments and comments types that lose detail", () => {
    const code = renderTypeScriptInterfaces({ scope: "segment", segment: segment("EnterpriseCustomer") });
    expect(code).toContain(
      "/**\n * Large companies\n *\n * Constraints:\n * - Healthcare companies require HIPAA compliance\n */\nexport interface EnterpriseCustomer {",
    );
    expect(code).toContain("  annualRevenue: number; // range(10M, 1B+)");
    expect(code).toContain("  score: string; // int(0, 100)");
  });

  test("renders free types, campaigns and lead scoring for the whole ontology", () => {
    const code = renderTypeScriptInterfaces({ scope: "ontology", ...ontologyBindings(ontology) });
    expect(code).toContain("/**\n * Postal address\n */\nexport interface Address {\n  city: string;\n}");
    expect(code).toContain("export type Money = number;");
    expect(code).toContain("export interface LeadScoringInput {\n  companySize: string;\n}");
    expect(code).toContain('export const LEAD_SCORING_THRESHOLDS: Record<string, number> = {\n  "hot": 80\n};');
    expect(code).not.toContain("CAMPAIGNS");
  });

  test("quotes keys that are not identifiers", () => {
    const code = renderTypeScriptInterfaces({
      scope: "segment",
      segment: { name: "Odd", fields: [fieldBinding("first-name", "string")], constraints: [], journeyStages: [] },
    });
    expect(code).toContain('  "first-name": string;');
  });

  test("keeps comment terminators in descriptions inside the doc block", () => {
    const code = renderTypeScriptInterfaces({
      scope: "segment",
      segment: {
        name: "Paths",
        description: "Matches src/*/index.ts",
        fields: [fieldBinding("glob", "string")],
        constraints: ["No */ in names"],
        journeyStages: [],
      },
    });
    expect(code).toContain(
      "/**\n * Matches src/*\\/index.ts\n *\n * Constraints:\n * - No *\\/ in names\n */\nexport interface Paths {",
    );
  });

  test("types a range with non-numeric bounds as string and keeps its text", () => {
    const code = renderTypeScriptInterfaces({
      scope: "segment",
      segment: {
        name: "Growth",
        fields: [fieldBinding("growthRate", "range(0%, 500%)")],
        constraints: [],
        journeyStages: [],
      },
    });
    expect(code).toContain("  growthRate: string; // range(0%, 500%)");
  });
});

describe("pydantic-model", () => {
  test("renders a segment model with constraints in the docstring", () => {
    const code = renderPydanticModels({ scope: "segment", segment: segment("EnterpriseCustomer") });
    expect(code).toContain("from pydantic import BaseModel, Field");
    expect(code).toContain(
      [
        "class EnterpriseCustomer(BaseModel):",
        '    """Large companies',
        "",
        "    Constraints:",
        "        - Healthcare companies require HIPAA compliance",
        '    """',
        '    companySize: Literal["1000-5000", "5000+"]',
        "    annualRevenue: float = Field(ge=10000000, le=1000000000)",
        "    score: str  # int(0, 100)",
      ].join("\n"),
    );
  });

  test("aliases names that are not Python identifiers", () => {
    const code = renderPydanticModels({
      scope: "segment",
      segment: {
        name: "Odd",
        fields: [fieldBinding("first-name", "string"), fieldBinding("class", "int")],
        constraints: [],
        journeyStages: [],
      },
    });
    expect(code).toContain('    first_name: str = Field(alias="first-name")');
    expect(code).toContain('    class_: int = Field(alias="class")');
  });

  test("escapes a description that ends in a quote", () => {
    const code = renderPydanticModels({
      scope: "segment",
      segment: { name: "Quoted", description: 'Known as "key"', fields: [], constraints: [], journeyStages: [] },
    });
    expect(code).toContain('class Quoted(BaseModel):\n    """Known as "key\\""""');
  });

  test("escapes a quote ending the last constraint line", () => {
    const code = renderPydanticModels({
      scope: "segment",
      segment: {
        name: "Quoted",
        fields: [],
        constraints: ['Tier must be "gold"'],
        journeyStages: [],
      },
    });
    expect(code).toContain('        - Tier must be "gold\\"\n    """');
  });

  test("renders free types and lead scoring", () => {
    const code = renderPydanticModels({ scope: "ontology", ...ontologyBindings(ontology) });
    expect(code).toContain('class Address(BaseModel):\n    """Postal address"""\n    city: str');
    expect(code).toContain("Money = float");
    expect(code).toContain('LEAD_SCORING_WEIGHTS: Dict[str, float] = {"companySize": 0.4}');
    expect(code).toContain("LEAD_SCORING_RULES: List[str] = []");
  });

  test("pyLiteral converts YAML values", () => {
    expect(pyLiteral({ active: true, tags: ["a", null], n: 2 })).toBe(
      '{"active": True, "tags": ["a", None], "n": 2}',
    );
  });
});

describe("salesforce", () => {
  test("renders validation rules as inactive placeholders", () => {
    expect(
      renderSalesforceValidation({
        segmentName: "EnterpriseCustomer",
        constraints: ["Healthcare companies require HIPAA compliance"],
      }),
    ).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<CustomObject xmlns="http://soap.sforce.com/2006/04/metadata">',
        "    <validationRules>",
        "        <fullName>EnterpriseCustomer_Rule_1</fullName>",
        "        <active>false</active>",
        "        <description>Healthcare companies require HIPAA compliance</description>",
        "        <errorConditionFormula>false</errorConditionFormula>",
        "        <errorMessage>Healthcare companies require HIPAA compliance</errorMessage>",
        "    </validationRules>",
        "</CustomObject>",
        "",
      ].join("\n"),
    );
  });

  test("renders custom fields with escaped text", () => {
    const xml = renderSalesforceObject({
      objectName: "Partner",
      description: "R&D <partners>",
      fields: [{ name: "tier", label: "Tier", type: "Picklist", values: ["gold"] }],
    });
    expect(xml).toContain("    <description>R&amp;D &lt;partners&gt;</description>");
    expect(xml).toContain("        <fullName>tier__c</fullName>");
    expect(xml).toContain(
      [
        "                <value>",
        "                    <fullName>gold</fullName>",
        "                    <default>false</default>",
        "                    <label>gold</label>",
        "                </value>",
      ].join("\n"),
    );
  });
});

describe("hubspot-properties", () => {
  test("wraps properties in a batch payload", () => {
    const json = renderHubspotProperties({
      properties: [
        { name: "notes", label: "Notes", type: "string", fieldType: "text", groupName: "ontology" },
      ],
    });
    expect(JSON.parse(json)).toEqual({
      inputs: [{ name: "notes", label: "Notes", type: "string", fieldType: "text", groupName: "ontology" }],
    });
  });
});

describe("docs", () => {
  test("renders a segment page with its journey", () => {
    const page = renderSegmentDocs({
      segment: {
        name: "Smb",
        description: "Small businesses",
        fields: [fieldBinding("size", 'enum["a|b"]')],
        constraints: ["Needs a card on file"],
        journeyStages: [
          { name: "awareness", duration: "1 week", touchpoints: ["ads", "blog"], successMetrics: ["clicks"] },
        ],
      },
    });
    expect(page).toBe(
      [
        "# Smb",
        "",
        "Small businesses",
        "",
        "## Properties",
        "",
        "| Property | Type |",
        "| --- | --- |",
        '| size | `enum["a\\|b"]` |',
        "",
        "## Constraints",
        "",
        "- Needs a card on file",
        "",
        "## Customer Journey",
        "",
        "### awareness",
        "",
        "- **Duration:** 1 week",
        "- **Touchpoints:** ads, blog",
        "- **Success metrics:** clicks",
        "",
      ].join("\n"),
    );
  });

  test("renders the ontology overview", () => {
    const doc = renderOntologyDocs(ontologyBindings(ontology));
    expect(doc.startsWith("# Business Ontology\n\n_2 segment(s), 0 campaign(s)._\n")).toBe(true);
    expect(doc).toContain("### EnterpriseCustomer\n\nLarge companies\n\n#### Properties");
    expect(doc).toContain("| Tier | Minimum Score |\n| --- | --- |\n| hot | 80 |");
    expect(doc).toContain("| Money | `range(0, 1M)` |  |");
  });
});

describe("createTemplateRenderer", () => {
  test("dispatches by template id and honours overrides", () => {
    const renderer = createTemplateRenderer({ "hubspot-properties": () => "custom" });
    expect(renderer.render("hubspot-properties", { properties: [] })).toBe("custom");
    expect(renderer.render("salesforce-validation", { segmentName: "S", constraints: [] })).toContain(
      "<CustomObject",
    );
  });
});

describe("text helpers", () => {
  test("escape XML and Markdown cells", () => {
    expect(escapeXml(`<a href="x">&'`)).toBe("&lt;a href=&quot;x&quot;&gt;&amp;&apos;");
    expect(mdCell("a|b\nc")).toBe("a\\|b c");
  });
});
