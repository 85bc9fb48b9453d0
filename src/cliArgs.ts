import { isLayoutVariant, LAYOUT_VARIANTS, LayoutVariant } from './types.js';

export interface CliOptions {
  filePath?: string;
  variant?: LayoutVariant;
  outputDir?: string;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function parseVariant(value: string | undefined): LayoutVariant {
  const normalized = (value ?? '').trim().toLowerCase();
  if (!isLayoutVariant(normalized)) {
    throw new CliUsageError(`--variant expects ${LAYOUT_VARIANTS.join(' or ')}, got "${value ?? ''}"`);
  }
  return normalized;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const [flag, inlineValue] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new CliUsageError(`${flag} needs a value`);
      }
      i += 1;
      return next;
    };

    switch (flag) {
      case '-h':
      case '--help':
      case 'help':
        options.help = true;
        break;
      case '-v':
      case '--variant':
        options.variant = parseVariant(takeValue());
        break;
      case '-o':
      case '--out':
        options.outputDir = takeValue();
        break;
      default:
        if (flag.startsWith('-')) {
          throw new CliUsageError(`Unknown option: ${flag}`);
        }
        if (options.filePath !== undefined) {
          throw new CliUsageError(`Unexpected argument: ${flag}`);
        }
        options.filePath = flag;
    }
  }

  return options;
}
