/**
 * Report generation module.
 * Transforms scenario results into the JSON contract and a terminal summary.
 */

export {
  RESULTS_FILE,
  formatSummary,
  generateJSON,
  serializeJSON,
  writeJSONReport,
} from './reporter.js';
