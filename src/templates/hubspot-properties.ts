/**
 * hubspot-properties template: a batch-create payload for the CRM
 * properties API (`{ "inputs": [...] }`).
 */

import type { HubspotBindings } from "../types/bindings.ts";

export function renderHubspotProperties(bindings: HubspotBindings): string {
  return JSON.stringify({ inputs: bindings.properties }, null, 2) + "\n";
}
