import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline/promises';
import { pathToFileURL } from 'node:url';
import { AgentOrchestrator } from './services/orchestrator';
import type { DataTable } from './types';
import { formatCell } from './utils/dataLoader';
import { errorMessage } from './utils/errors';

export const HELP = `Commands:
  :load <path>    upload a CSV or Excel file
  :preview [n]    show the first n rows (default 5)
  :schema         show column types and samples
  :info           show row and column counts
  :history        show the remembered conversation
  :clear          forget the conversation, keep the data
  :reset          forget everything
  :help           show this help
  :quit           exit
Anything else is asked as a question about the loaded data.`;

export interface CommandResult {
  output: string;
  quit?: boolean;
}

type FileReader = (filePath: string) => Promise<Uint8Array>;

export const renderTable = (table: DataTable): string => {
  const cells = table.rows.map((row) => table.headers.map((h) => formatCell(row[h] ?? null)));
  const widths = table.headers.map((h, i) => cells.reduce((w, r) => Math.max(w, r[i].length), h.length));
  const line = (values: string[]) => values.map((v, i) => v.padEnd(widths[i])).join(' | ').trimEnd();
  return [line(table.headers), widths.map((w) => '-'.repeat(w)).join('-+-'), ...cells.map(line)].join('\n');
};

export const handleCommand = async (
  orchestrator: AgentOrchestrator,
  input: string,
  read: FileReader = (filePath) => readFile(filePath),
): Promise<CommandResult> => {
  const line = input.trim();
  if (line === '') return { output: '' };

  if (!line.startsWith(':')) {
    const result = await orchestrator.processQuery(line);
    if (!result.success) return { output: result.error ?? result.answer };
    const parts = [result.planDisplay, '', result.answer];
    if (result.resultTable && result.resultTable.rows.length > 0) {
      parts.push('', renderTable({ headers: result.resultTable.headers, rows: result.resultTable.rows.slice(0, 20) }));
    }
    if (result.imagePath) parts.push('', `Chart: ${result.imagePath}`);
    return { output: parts.join('\n') };
  }

  const [command, ...args] = line.slice(1).split(/\s+/);
  switch (command) {
    case 'load': {
      const filePath = args.join(' ');
      if (!filePath) return { output: 'Usage: :load <path>' };
      let bytes: Uint8Array;
      try {
        bytes = await read(filePath);
      } catch (error) {
        return { output: `Could not read ${filePath}: ${errorMessage(error)}` };
      }
      return { output: orchestrator.loadData(bytes, path.basename(filePath)).message };
    }
    case 'preview': {
      const n = args[0] ? Number.parseInt(args[0], 10) : 5;
      const preview = orchestrator.getDataPreview(Number.isNaN(n) ? 5 : n);
      return { output: preview ? renderTable(preview) : 'No data loaded.' };
    }
    case 'schema':
      return { output: orchestrator.getDataSchema() };
    case 'info':
      return { output: orchestrator.getDataInfo() };
    case 'history': {
      const history = orchestrator.getConversationHistory();
      if (history.length === 0) return { output: 'No previous conversation.' };
      return {
        output: history
          .map((msg) => `[${msg.timestamp.toISOString()}] ${msg.role === 'user' ? 'User' : 'Assistant'}: ${msg.content}`)
          .join('\n'),
      };
    }
    case 'clear':
      orchestrator.clearConversation();
      return { output: 'Conversation cleared.' };
    case 'reset':
      orchestrator.reset();
      return { output: 'Session reset.' };
    case 'help':
      return { output: HELP };
    case 'quit':
    case 'exit':
      return { output: 'Bye.', quit: true };
    default:
      return { output: `Unknown command ':${command}'. Type :help for the list.` };
  }
};

const main = async (): Promise<void> => {
  const orchestrator = new AgentOrchestrator();
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  console.log('Data Room. Type :help for commands.');
  try {
    for (;;) {
      const { output, quit } = await handleCommand(orchestrator, await rl.question('> '));
      if (output) console.log(output);
      if (quit) break;
    }
  } finally {
    rl.close();
  }
};

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
}
