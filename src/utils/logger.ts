import chalk from 'chalk';

type Level = 'info' | 'warn' | 'error' | 'debug' | 'success';

interface LevelStyle {
  tag: string;
  paint: (text: string) => string;
  toStderr: boolean;
}

const LEVELS: Record<Level, LevelStyle> = {
  info: { tag: '[INFO]', paint: chalk.cyan, toStderr: false },
  warn: { tag: '[WARN]', paint: chalk.yellow, toStderr: false },
  error: { tag: '[ERROR]', paint: chalk.red, toStderr: true },
  debug: { tag: '[DEBUG]', paint: chalk.gray, toStderr: false },
  success: { tag: '[SUCCESS]', paint: chalk.green, toStderr: false }
};

const RULE = '='.repeat(70);

const flagSet = (name: string): boolean => ['1', 'true'].includes(process.env[name] ?? '');

function emit(level: Level, message: string, detail?: unknown): void {
  if (flagSet('LOG_SILENT') || (level === 'debug' && !flagSet('DEBUG'))) return;

  const { tag, paint, toStderr } = LEVELS[level];
  const line = `${paint(tag)} ${new Date().toISOString()} ${message}`;
  const args = detail === undefined ? [line] : [line, detail];
  (toStderr ? console.error : console.log)(...args);
}

/** Phase heading, centred between two rules. */
function banner(title: string): void {
  if (flagSet('LOG_SILENT')) return;

  const indent = ' '.repeat(Math.max(0, Math.floor((RULE.length - title.length) / 2)));
  console.log(['', chalk.bold(RULE), indent + chalk.bold(title), chalk.bold(RULE)].join('\n'));
}

const at =
  (level: Level) =>
  (message: string, detail?: unknown): void =>
    emit(level, message, detail);

export const logger = {
  info: at('info'),
  warn: at('warn'),
  error: at('error'),
  debug: at('debug'),
  success: at('success'),
  banner
};
