export interface ExportArguments {
  url?: string;
  group?: string;
  output: string;
  verbose: boolean;
}

export const EXPORT_USAGE =
  'Использование: npm run export -- [--url URL] [--group GROUP] [--output DIR] [--verbose]';

export class ExportArgumentsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExportArgumentsError';
  }
}

const VALUE_FLAGS = ['--url', '--group', '--output'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === arg);
}

/** Поддерживает `--flag value` и `--flag=value`. */
export function parseExportArguments(argv: string[]): ExportArguments {
  const result: ExportArguments = { output: '.', verbose: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--verbose' || arg === '-v') {
      result.verbose = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (!isValueFlag(flag)) {
      throw new ExportArgumentsError(`Неизвестный аргумент: ${arg}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (!value || value.startsWith('--')) {
      throw new ExportArgumentsError(`Не указано значение для ${flag}`);
    }

    if (flag === '--url') result.url = value;
    else if (flag === '--group') result.group = value;
    else result.output = value;
  }

  return result;
}
