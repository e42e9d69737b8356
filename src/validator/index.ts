export {
  OntologyValidator,
  summarizeFindings,
  PASCAL_CASE,
  CAMEL_CASE,
  SCORE_DEFINITION,
} from "./ontology-validator.ts";
