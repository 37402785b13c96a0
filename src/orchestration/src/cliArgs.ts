/**
 * Command-line argument parsing for the RAG CLI
 */

export type CliCommand = 'ingest' | 'ask' | 'chat' | 'retrieve' | 'inspect' | 'help';

export interface CliArgs {
  command: CliCommand;
  question?: string;
  model?: string;
  topK?: number;
  pdfDir?: string;
  chunkSize?: number;
  overlap?: number;
  showSources: boolean;
}

const COMMANDS: readonly CliCommand[] = ['ingest', 'ask', 'chat', 'retrieve', 'inspect', 'help'];

export const USAGE = `
Clinical Guidelines RAG

Usage:
  clinical-rag <command> [options]

Commands:
  ingest                    Extract, chunk and store every PDF in the PDF directory
  ask <question>            Answer one question from the stored guidelines
  chat                      Interactive question loop
  retrieve <question>       Show the ranked chunks retrieved for a question
  inspect                   Show extraction stats and a chunk preview per PDF

Options:
  --model <name>            Chat model (default: RAG_LLM_MODEL or provider default)
  --top-k <n>               Chunks retrieved per question (default: RAG_TOP_K or 5)
  --pdf-dir <dir>           PDF directory (default: RAG_PDF_DIR or ./data/pdfs)
  --chunk-size <n>          Chunk size for inspect (default: RAG_CHUNK_SIZE or 1200)
  --overlap <n>             Chunk overlap for inspect (default: RAG_CHUNK_OVERLAP or 200)
  --sources                 With ask: list the chunks the answer used
  --help, -h                Show this help message

Environment Variables:
  RAG_LLM_PROVIDER          ollama (default) or groq
  GROQ_API_KEY              Required for the groq provider
  CHROMA_URL, OLLAMA_URL    Service locations
  RAG_STORE                 chroma (default) or memory

Examples:
  clinical-rag ingest
  clinical-rag ask "What is an estimand according to ICH E9(R1)?" --top-k 8
  clinical-rag chat --model llama3.1
`;

function parseNumber(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`${flag} expects a number (got ${value ?? 'nothing'})`);
  }
  return parsed;
}

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some(command => command === value);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: 'help', showSources: false };

  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return args;
  }

  const [command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new Error(`Unknown command: ${command}`);
  }
  args.command = command;

  const positional: string[] = [];
  for (let i = 0; i < rest.length; i++) {
    const key = rest[i];

    switch (key) {
      case '--model':
        args.model = rest[++i];
        break;
      case '--top-k':
        args.topK = parseNumber(key, rest[++i]);
        break;
      case '--pdf-dir':
        args.pdfDir = rest[++i];
        break;
      case '--chunk-size':
        args.chunkSize = parseNumber(key, rest[++i]);
        break;
      case '--overlap':
        args.overlap = parseNumber(key, rest[++i]);
        break;
      case '--sources':
        args.showSources = true;
        break;
      default:
        if (key.startsWith('--')) {
          throw new Error(`Unknown option: ${key}`);
        }
        positional.push(key);
    }
  }

  if (positional.length > 0) {
    args.question = positional.join(' ');
  }

  if ((args.command === 'ask' || args.command === 'retrieve') && !args.question) {
    throw new Error(`The ${args.command} command needs a question`);
  }

  return args;
}
