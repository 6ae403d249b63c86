export { handleWebSearch } from './webSearch';
export { handleScrapePage } from './scrapePage';
export { handleDiagnostics } from './diagnostics';
export type { ToolResult } from './toolResult';
