/**
 * Tools Index - Exports the timing summary tools for MCP
 */

export {
  summaryToolDefinitions,
  summaryToolHandlers,
  type SummaryToolHandler,
} from "./summary-tools.js";
