import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  verbose?: boolean;
}

export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const scope = event.remoteIdentifier ?? event.type;
  let output = `[${event.severity}] ${scope}: ${event.message}`;
  if (options.verbose === true) {
    const extras = Object.entries(event.details).map(([key, value]) => `${key}=${value}`);
    if (extras.length > 0) output += ` (${extras.join(', ')})`;
  }

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
