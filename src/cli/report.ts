import pc from 'picocolors';

import type { CallReport } from '../telemetry/scope.js';

export type Colors = ReturnType<typeof pc.createColors>;

/** One-line summary of a finished call, for `--verbose`. */
export function formatReport(report: CallReport, c: Colors = pc): string {
  const kind = report.streaming ? `${report.operation} (stream)` : report.operation;
  const model = report.responseModel ?? report.requestModel;
  const status = report.errorType
    ? c.red(`error=${report.errorType}`)
    : c.green(`finish=${report.finishReasons.join(',') || '-'}`);
  const tokens = `tokens ${report.inputTokens ?? '-'}/${report.outputTokens ?? '-'}`;
  const ms = `${Math.round(report.durationMs)}ms`;
  const tools = report.summary?.toolCalls.length ? ` · ${report.summary.toolCalls.length} tool call(s)` : '';
  return `${c.dim('[chatscope]')} ${kind} ${model} · ${status} · ${tokens} · ${ms}${tools}`;
}
