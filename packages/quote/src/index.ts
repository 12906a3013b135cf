/**
 * @shapemacro/quote - Templates with expression and value splices
 */

export {
  parseTemplate,
  materialize,
  type Template,
  type TemplateKind,
  type HoleKind,
  type ExpressionBindings,
  type ValueBindings,
} from "./template.js";

export {
  template,
  statements,
  expr,
  value,
  quote,
  quoteStatements,
  type HoleMarker,
  type QuoteSplice,
} from "./tagged.js";
