import type pino from 'pino';
import { DiagnosticsInput } from '../mcp/schemas';
import { formatDiagnosticsReport, runDiagnostics } from '../core/search/diagnostics';
import { generateCorrelationId } from '../utils/logger';
import { errorResult, textResult, type ToolResult } from './toolResult';

export async function handleDiagnostics(args: unknown, logger: pino.Logger): Promise<ToolResult> {
  const childLogger = logger.child({ correlationId: generateCorrelationId() });

  try {
    const input = DiagnosticsInput.parse(args ?? {});
    const report = await runDiagnostics(input.searxngUrl, childLogger);
    return textResult(formatDiagnosticsReport(report));
  } catch (error) {
    return errorResult(error, childLogger, 'Diagnostics');
  }
}
