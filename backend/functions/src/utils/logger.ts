/**
 * Système de logging structuré - Donation Registry
 * Logging centralisé avec support pour différents niveaux et contextes
 */

import type { NextFunction, Request, Response } from 'express';

/**
 * Interface pour le contexte de logging
 */
export interface LogContext {
  caller?: string;
  projectId?: string;
  functionName?: string;
  traceId?: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * Niveaux de log
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

/**
 * Interface pour une entrée de log structurée
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  data?: unknown;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
    statusCode?: number;
  };
}

const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'authorization', 'cookie', 'privatekey', 'mnemonic'];

function readErrorField(error: Error, field: 'code' | 'statusCode'): unknown {
  return field in error ? Reflect.get(error, field) : undefined;
}

/**
 * Classe principale du logger
 */
export class Logger {
  private context: LogContext = {};
  private readonly environment: string;
  private readonly logLevel: LogLevel;

  constructor(context: LogContext = {}) {
    this.environment = process.env.NODE_ENV || 'development';
    this.logLevel = this.getLogLevel();
    this.context = { ...context };
  }

  /**
   * Définit le niveau de log selon l'environnement
   */
  private getLogLevel(): LogLevel {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();

    switch (envLevel) {
      case 'debug':
        return LogLevel.DEBUG;
      case 'info':
        return LogLevel.INFO;
      case 'warn':
        return LogLevel.WARN;
      case 'error':
        return LogLevel.ERROR;
      case 'fatal':
        return LogLevel.FATAL;
      default:
        return this.environment === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const levels = Object.values(LogLevel);
    return levels.indexOf(level) >= levels.indexOf(this.logLevel);
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    data?: unknown,
    error?: Error,
    additionalContext?: LogContext
  ): LogEntry {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    if (Object.keys(this.context).length > 0 || additionalContext) {
      entry.context = { ...this.context, ...additionalContext };
    }

    if (data !== undefined) {
      entry.data = this.sanitizeData(data);
    }

    if (error) {
      const code = readErrorField(error, 'code');
      const statusCode = readErrorField(error, 'statusCode');
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: typeof code === 'string' ? code : undefined,
        statusCode: typeof statusCode === 'number' ? statusCode : undefined,
      };
    }

    return entry;
  }

  /**
   * Sanitise les données sensibles et rend les bigint sérialisables
   */
  private sanitizeData(data: unknown): unknown {
    const sanitize = (value: unknown, depth: number): unknown => {
      if (depth > 10) return '[Max Depth Reached]';

      if (typeof value === 'bigint') {
        return value.toString();
      }

      if (value === null || typeof value !== 'object') {
        return value;
      }

      if (Array.isArray(value)) {
        return value.map(item => sanitize(item, depth + 1));
      }

      const sanitized: Record<string, unknown> = {};
      for (const [key, nested] of Object.entries(value)) {
        const keyLower = key.toLowerCase();
        sanitized[key] = SENSITIVE_FIELDS.some(field => keyLower.includes(field))
          ? '[REDACTED]'
          : sanitize(nested, depth + 1);
      }
      return sanitized;
    };

    return sanitize(data, 0);
  }

  /**
   * Émet un log vers la sortie appropriée
   */
  private emit(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) {
      return;
    }

    if (this.environment === 'development') {
      this.consoleLog(entry);
    } else {
      // JSON structuré (compatible Cloud Logging)
      console.log(JSON.stringify(entry));
    }
  }

  /**
   * Affichage console formaté pour le développement
   */
  private consoleLog(entry: LogEntry): void {
    const colors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: '\x1b[36m',
      [LogLevel.INFO]: '\x1b[32m',
      [LogLevel.WARN]: '\x1b[33m',
      [LogLevel.ERROR]: '\x1b[31m',
      [LogLevel.FATAL]: '\x1b[35m',
    };

    const reset = '\x1b[0m';
    const timestamp = entry.timestamp.substring(11, 23); // HH:MM:SS.mmm
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? ` [${JSON.stringify(entry.context)}]` : '';

    console.log(`${colors[entry.level]}${timestamp} ${level}${reset} ${entry.message}${context}`);

    if (entry.data !== undefined) {
      console.log('  Data:', entry.data);
    }

    if (entry.error) {
      console.log('  Error:', entry.error);
    }
  }

  public debug(message: string, data?: unknown, context?: LogContext): void {
    this.emit(this.createLogEntry(LogLevel.DEBUG, message, data, undefined, context));
  }

  public info(message: string, data?: unknown, context?: LogContext): void {
    this.emit(this.createLogEntry(LogLevel.INFO, message, data, undefined, context));
  }

  public warn(message: string, data?: unknown, context?: LogContext): void {
    this.emit(this.createLogEntry(LogLevel.WARN, message, data, undefined, context));
  }

  /**
   * Log de niveau ERROR
   * Si le second paramètre n'est pas une erreur, il est traité comme des données
   */
  public error(message: string, error?: unknown, context?: LogContext): void {
    if (error instanceof Error) {
      this.emit(this.createLogEntry(LogLevel.ERROR, message, undefined, error, context));
    } else {
      this.emit(this.createLogEntry(LogLevel.ERROR, message, error, undefined, context));
    }
  }

  /**
   * Log spécifique pour les mouvements de valeur
   */
  public financial(message: string, data?: unknown, context?: LogContext): void {
    this.emit(this.createLogEntry(LogLevel.INFO, `[FINANCIAL] ${message}`, data, undefined, {
      ...context,
      category: 'financial',
    }));
  }

  /**
   * Log d'événements de sécurité
   */
  public security(
    event: string,
    severity: 'low' | 'medium' | 'high' | 'critical',
    data?: unknown,
    context?: LogContext
  ): void {
    const logLevel = severity === 'critical' ? LogLevel.FATAL :
                    severity === 'high' ? LogLevel.ERROR :
                    severity === 'medium' ? LogLevel.WARN : LogLevel.INFO;

    this.emit(this.createLogEntry(
      logLevel,
      `SECURITY: ${event}`,
      data,
      undefined,
      { ...context, securityEvent: event, severity }
    ));
  }

  /**
   * Log d'événements d'audit
   */
  public audit(
    action: string,
    resource: string,
    result: 'success' | 'failure',
    data?: Record<string, unknown>,
    context?: LogContext
  ): void {
    this.info(`AUDIT: ${action} on ${resource}`, {
      ...data,
      auditAction: action,
      auditResource: resource,
      auditResult: result,
    }, context);
  }

  /**
   * Log d'événements métier
   */
  public business(
    event: string,
    entity: string,
    data?: Record<string, unknown>,
    context?: LogContext
  ): void {
    this.info(`BUSINESS: ${event}`, {
      ...data,
      businessEvent: event,
      businessEntity: entity,
    }, context);
  }

  /**
   * Crée un logger enfant avec un contexte spécifique
   */
  public child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context });
  }

  /**
   * Middleware Express : trace chaque requête et sa durée
   */
  public middleware() {
    return (
      req: Pick<Request, 'header' | 'method' | 'originalUrl'>,
      res: Pick<Response, 'locals' | 'setHeader' | 'on' | 'statusCode'>,
      next: NextFunction
    ): void => {
      const traceHeader = req.header('x-cloud-trace-context');
      const requestId = traceHeader?.split('/')[0] ||
        `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;

      res.locals.requestId = requestId;
      res.setHeader('X-Request-ID', requestId);

      const requestLogger = this.child({ requestId });
      const startTime = Date.now();

      requestLogger.info('Request started', {
        method: req.method,
        url: req.originalUrl,
        userAgent: req.header('user-agent'),
      });

      res.on('finish', () => {
        requestLogger.info('Request completed', {
          statusCode: res.statusCode,
          duration: Date.now() - startTime,
        });
      });

      next();
    };
  }
}

/**
 * Instance globale du logger
 */
export const logger = new Logger();
