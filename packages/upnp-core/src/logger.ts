import * as winston from 'winston';
import { Logtail } from '@logtail/node';
import { LogtailTransport } from '@logtail/winston';
import type { ILogtailLog } from '@logtail/types';

// הרחבת TransformableInfo כדי ש-TypeScript יכיר את השדות שאנחנו מוסיפים
declare module 'winston' {
  namespace Logform {
    interface TransformableInfo {
      environment?: string;
      module?: string;
      label?: string;
    }
  }
}

/*
```sh
LOG_LEVEL=debug LOG_MODULES=upnpService,SubscribeManager npm test
```
*/

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export type LogLevel = keyof typeof logLevels;

export type CustomLogger = winston.Logger & {
  [level in LogLevel]: winston.LeveledLogMethod;
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
  trace: 'magenta',
};

winston.addColors(logColors);

const DEFAULT_LOG_FILE = 'logs/bridge.log';

function splitModuleList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(m => m.trim()).filter(m => m);
}

function isEnabled(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') return defaultValue;
  return value === 'true' || value === '1';
}

// --- פורמטים ---

// הסתרת מודולים לפי LOG_HIDE_MODULES
const hideByModuleNameFormat = winston.format((info) => {
  const hidden = splitModuleList(process.env.LOG_HIDE_MODULES);
  if (info.label && hidden.includes(info.label)) {
    return false;
  }
  return info;
});

// הצגה סלקטיבית לפי LOG_MODULES ("*" או ריק = הכל)
const filterByModuleNameFormat = winston.format((info) => {
  const raw = process.env.LOG_MODULES;
  if (!raw || raw.trim() === '*') {
    return info;
  }
  const allowed = splitModuleList(raw);
  if (info.label && allowed.length > 0 && !allowed.includes(info.label)) {
    return false;
  }
  return info;
});

const ERROR_LIKE_KEYS = ['message', 'code', 'errno', 'syscall', 'address', 'port'] as const;

function isErrorLike(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && ERROR_LIKE_KEYS.some(key => key in value);
}

/**
 * @hebrew מפרמט את המטא-דאטה של רשומת לוג למחרוזת key=value.
 * שגיאות ואובייקטים שנראים כמו שגיאות רשת מודפסים בצורה מקוצרת.
 */
export function formatLogMetadata(metadata: Record<string, unknown>): string {
  const entries = Object.entries(metadata);
  if (entries.length === 0) {
    return '';
  }

  const metaString = entries
    .map(([key, value]) => {
      if (value instanceof Error) {
        return `${key}=Error: ${value.message}${value.stack ? `\nStack: ${value.stack}` : ''}`;
      }
      if (isErrorLike(value)) {
        const parts = ERROR_LIKE_KEYS
          .filter(field => value[field] !== undefined && value[field] !== '')
          .map(field => `${field}: ${JSON.stringify(value[field])}`);
        return `${key}=PotentialError: { ${parts.join(', ')} }`;
      }
      try {
        return `${key}=${JSON.stringify(value)}`;
      } catch {
        return `${key}=[UnstringifiableObject]`;
      }
    })
    .join(' ');

  return metaString ? ` ${metaString}` : '';
}

function renderLine(info: winston.Logform.TransformableInfo, levelString: string): string {
  let line = `${String(info.timestamp)} [${info.environment?.toUpperCase()}] [${levelString}]`;
  if (info.module) {
    line += ` (${info.module})`;
  }
  line += `: ${String(info.message)}`;

  const {
    level: _level, message: _message, timestamp: _timestamp, label: _label,
    module: _module, environment: _environment,
    stack,
    ...rest
  } = info;

  line += formatLogMetadata(rest);
  if (typeof stack === 'string') {
    line += `\n${stack}`;
  }
  return line;
}

// פורמט טקסט ללא צבעים (לקבצים)
export const fileFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => {
    const originalLevel = info[Symbol.for('level')];
    const levelString = typeof originalLevel === 'string' ? originalLevel.toUpperCase() : 'UNKNOWN_LEVEL';
    return renderLine(info, levelString);
  }),
);

export const consoleFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => renderLine(info, info.level.toUpperCase())),
  winston.format.colorize({ colors: logColors, message: true, level: true, all: true }),
);

// --- טרנספורטים ---

function setupLogtailTransport(moduleName: string, environment: string): winston.transport | null {
  const sourceToken = process.env.LOGTAIL_SOURCE_TOKEN;
  const ingestingHost = process.env.LOGTAIL_INGESTING_HOST;
  const logToLogtail = isEnabled(process.env.LOG_TO_LOGTAIL, false);

  if (!logToLogtail) {
    return null;
  }
  if (!sourceToken || !ingestingHost) {
    console.warn(`[LoggerSetup] LOG_TO_LOGTAIL=true but LOGTAIL_SOURCE_TOKEN or LOGTAIL_INGESTING_HOST is missing (module: ${moduleName}).`);
    return null;
  }

  try {
    const logtail = new Logtail(sourceToken, { endpoint: `https://${ingestingHost}` });
    const envLocation = process.env.ENV_LOCATION;

    // Logtail לא מכיר את trace, ממפים ל-debug ושומרים את הרמה המקורית
    logtail.use(async (log: ILogtailLog): Promise<ILogtailLog> => {
      const withContext: ILogtailLog = { ...log };
      if (envLocation) {
        Object.assign(withContext, { env_location: envLocation });
      }
      if (String(withContext.level) === 'trace') {
        Object.assign(withContext, { level: 'debug', original_level: 'trace' });
      }
      return withContext;
    });

    return new LogtailTransport(logtail);
  } catch (error) {
    console.warn(`[LoggerSetup] Failed to initialize Logtail transport for ${moduleName} (${environment}):`, error);
    return null;
  }
}

/**
 * @hebrew יוצר לוגר עבור מודול בודד.
 * הטרנספורטים נקבעים לפי משתני הסביבה LOG_TO_CONSOLE, LOG_TO_FILE ו-LOG_TO_LOGTAIL.
 * @param moduleName - שם המודול שיופיע בכל שורה ומשמש לסינון.
 */
const createModuleLogger = (moduleName: string): CustomLogger => {
  const environment = process.env.NODE_ENV || 'unknown';
  const transports: winston.transport[] = [];
  const logToFile = isEnabled(process.env.LOG_TO_FILE, false);

  if (isEnabled(process.env.LOG_TO_CONSOLE, true)) {
    transports.push(new winston.transports.Console({ format: consoleFormat() }));
  }

  if (logToFile) {
    transports.push(new winston.transports.File({
      filename: process.env.LOG_FILE_PATH || DEFAULT_LOG_FILE,
      format: fileFormat(),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      tailable: true,
    }));
  }

  const logtailTransport = setupLogtailTransport(moduleName, environment);
  if (logtailTransport) {
    transports.push(logtailTransport);
  }

  if (transports.length === 0) {
    // winston מתלונן על לוגר בלי טרנספורטים
    transports.push(new winston.transports.Console({ silent: true }));
  }

  const exceptionHandlers = logToFile
    ? [new winston.transports.File({ filename: process.env.LOG_EXCEPTIONS_PATH || 'logs/exceptions.log', format: fileFormat() })]
    : undefined;
  const rejectionHandlers = logToFile
    ? [new winston.transports.File({ filename: process.env.LOG_REJECTIONS_PATH || 'logs/rejections.log', format: fileFormat() })]
    : undefined;

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    levels: logLevels,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format((info) => {
        info.environment = environment;
        info.module = moduleName;
        info.label = moduleName;
        return info;
      })(),
      winston.format.errors({ stack: true }),
    ),
    transports,
    exceptionHandlers,
    rejectionHandlers,
    exitOnError: false,
  }) as CustomLogger;
};

export default createModuleLogger;
export { createModuleLogger };
