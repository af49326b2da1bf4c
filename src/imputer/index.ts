/**
 * Imputation of missing values with typed column defaults.
 */

export { impute, countUncovered } from "./impute.js";

export {
  applyDefault,
  createDefaultTable,
  textDefault,
  numericDefault,
  dateDefault,
  PAPER_METADATA_DEFAULTS,
  BASELINE_PUBLISH_DATE,
  type FieldKind,
  type FieldDefault,
  type DefaultTable,
  type Coercer,
} from "./default-table.js";
