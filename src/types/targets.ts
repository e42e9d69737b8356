/** Native shapes produced by the compile targets */

/** JSON Schema (draft-07) node */
export interface JsonSchema {
  $schema?: string;
  title?: string;
  description?: string;
  type?: "string" | "integer" | "number" | "boolean" | "array" | "object";
  format?: string;
  enum?: string[];
  items?: JsonSchema;
  minimum?: number;
  maximum?: number;
  properties?: Record<string, JsonSchema>;
  required?: string[];
}

export type SalesforceFieldType =
  | "Text"
  | "Picklist"
  | "MultiselectPicklist"
  | "Checkbox"
  | "Number"
  | "DateTime";

/** A Salesforce custom field descriptor */
export interface SalesforceField {
  /** Ontology property name; the API name adds `__c` */
  name: string;
  label: string;
  type: SalesforceFieldType;
  length?: number;
  precision?: number;
  scale?: number;
  /** Picklist values, in declaration order */
  values?: string[];
  visibleLines?: number;
  defaultValue?: string;
}

export type HubspotPropertyType =
  | "string"
  | "number"
  | "boolean"
  | "datetime"
  | "enumeration";

export type HubspotFieldType =
  | "text"
  | "number"
  | "booleancheckbox"
  | "date"
  | "select"
  | "checkbox";

export interface HubspotOption {
  label: string;
  value: string;
  displayOrder: number;
}

/** A HubSpot custom property descriptor */
export interface HubspotProperty {
  name: string;
  label: string;
  type: HubspotPropertyType;
  fieldType: HubspotFieldType;
  groupName: string;
  options?: HubspotOption[];
}
