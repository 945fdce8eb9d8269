// Main formatter exports
export {
  formatScanResultsCsv,
  formatScanResultLine,
  SCAN_RESULTS_CSV_HEADER
} from './scan_results';
