import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

// Color definitions for different log levels
type Colorizer = chalk.Chalk;

const levelColors: Record<string, Colorizer> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  http: chalk.magenta,
  debug: chalk.cyan,
};

const levelBrightColors: Record<string, Colorizer> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  http: chalk.magentaBright,
  debug: chalk.cyanBright,
};

const levelIcons: Record<string, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  http: '🌐',
  debug: '🔍',
};

const moduleTag = (module: unknown): string => (typeof module === 'string' ? `[${module}] ` : '');

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack, module }) => {
  const color = levelColors[level] ?? chalk.white;
  const brightColor = levelBrightColors[level] ?? chalk.whiteBright;
  const icon = levelIcons[level] ?? '📝';

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);
  const iconStr = icon;

  // Format the message - use bright color for strings
  const formattedMessage =
    chalk.gray(moduleTag(module)) +
    (typeof message === 'string' ? brightColor(message) : JSON.stringify(message));

  // Include stack trace for errors
  const output = stack
    ? `${timestampStr} ${iconStr} ${levelStr} ${chalk.gray(moduleTag(module))}\n${chalk.red(String(stack))}`
    : `${timestampStr} ${iconStr} ${levelStr} ${formattedMessage}`;

  return output;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack, module }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${moduleTag(module)}${String(stack ?? message)}`;
});

// Create logger instance
const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'interunit-recon' },
  transports: [
    // Console transport with colors
    new winston.transports.Console({
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        colorizedFormat
      ),
    }),
  ],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
}

/**
 * Child logger that tags every line with a module name, e.g. "[matching]"
 */
export const createModuleLogger = (module: string): winston.Logger => logger.child({ module });

const toMessage = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

// Static facade for startup banners and ad-hoc messages
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    const message = toMessage(args);
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(message));
  };

  // Box-styled important message
  public static box = (title: string, message: string): void => {
    const line = '═'.repeat(50);
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╔${line}╗`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(49)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╠${line}╣`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.white(` ${message.padEnd(49)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╚${line}╝`));
  };
}

export default logger;
