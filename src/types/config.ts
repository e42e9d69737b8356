/** Configuration types parsed from ontoc.yaml */

export interface HubspotConfig {
  /** Property group every generated HubSpot property is filed under */
  groupName: string;
}

export interface SalesforceConfig {
  /** Length of the fallback Text field */
  textLength: number;
}

export interface ProjectConfig {
  /** Ontology file or directory, relative to the project root */
  ontologyPath: string;
  /** Output directory for `compile`, relative to the project root */
  outputDir: string;
  /** Targets compiled when `--target` is not given */
  targets: string[];
  hubspot: HubspotConfig;
  salesforce: SalesforceConfig;
}

/** Settings the CRM mappers read */
export type CrmOptions = Pick<ProjectConfig, "hubspot" | "salesforce">;

export const CONFIG_FILE = "ontoc.yaml";

/** Default config when no ontoc.yaml is found */
export const DEFAULT_PROJECT_CONFIG: ProjectConfig = {
  ontologyPath: "ontology",
  outputDir: "generated",
  targets: ["json-schema"],
  hubspot: { groupName: "ontology" },
  salesforce: { textLength: 255 },
};
