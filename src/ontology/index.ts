export { Ontology } from "./ontology.ts";
export {
  parseOntologyDocument,
  loadOntologyFile,
  loadOntologyDirectory,
  loadOntology,
  listYamlFiles,
  type DirectoryLoadOptions,
} from "./loader.ts";
export { OntologyDocumentSchema, type OntologyDocument } from "./document-schema.ts";
