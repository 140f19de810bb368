import { Inject, Injectable, LoggerService, Optional, Scope } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { DestinationStream, Level, Logger, LoggerOptions } from 'pino';
import { AppConfig } from '../../config/configuration';

type LogFields = Record<string, unknown>;

/**
 * Token for an alternative output stream. Stdout when nothing is bound.
 */
const LOG_DESTINATION = 'LogDestination';

const STACK_TRACE = /^(.)+\n\s+at .+:\d+:\d+/;

/**
 * Structured logger. Every level takes either a message or a field object
 * followed by a message; the context label set by the consumer is added to
 * each line.
 *
 * Transient so that every consumer gets its own context label.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    @Optional() @Inject(LOG_DESTINATION) destination?: DestinationStream,
  ) {
    const logLevel = this.configService.get('logLevel', { infer: true }) || 'info';
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });

    const options: LoggerOptions = {
      level: logLevel,
      ...(nodeEnv === 'development' &&
        !destination && {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'download-notifier',
        env: nodeEnv,
      },
    };

    this.logger = destination ? pino(options, destination) : pino(options);
  }

  setContext(context: string): void {
    this.context = context;
  }

  /**
   * Nest's own log calls, e.g. module bootstrap lines.
   */
  log(message: string, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  verbose(message: string, ...optionalParams: unknown[]): void {
    this.write('trace', message, optionalParams);
  }

  info(message: string, ...optionalParams: unknown[]): void;
  info(fields: LogFields, message: string): void;
  info(fieldsOrMessage: LogFields | string, ...rest: unknown[]): void {
    this.write('info', fieldsOrMessage, rest);
  }

  warn(message: string, ...optionalParams: unknown[]): void;
  warn(fields: LogFields, message: string): void;
  warn(fieldsOrMessage: LogFields | string, ...rest: unknown[]): void {
    this.write('warn', fieldsOrMessage, rest);
  }

  error(message: string, ...optionalParams: unknown[]): void;
  error(fields: LogFields, message: string): void;
  error(fieldsOrMessage: LogFields | string, ...rest: unknown[]): void {
    this.write('error', fieldsOrMessage, rest);
  }

  debug(message: string, ...optionalParams: unknown[]): void;
  debug(fields: LogFields, message: string): void;
  debug(fieldsOrMessage: LogFields | string, ...rest: unknown[]): void {
    this.write('debug', fieldsOrMessage, rest);
  }

  /**
   * Logger sharing this one's context, with `bindings` on every line.
   */
  child(bindings: LogFields): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }

  withJobId(jobId: string): PinoLoggerService {
    return this.child({ jobId });
  }

  private write(level: Level, fieldsOrMessage: LogFields | string, rest: unknown[]): void {
    if (typeof fieldsOrMessage === 'string') {
      this.logger[level](this.nestFields(level, rest), fieldsOrMessage);
      return;
    }
    const message = rest[0];
    this.logger[level](
      { ...fieldsOrMessage, context: this.context },
      typeof message === 'string' ? message : '',
    );
  }

  /**
   * Nest calls `(message, context)`, and `(message, stack, context)` for errors.
   * A lone error argument is a stack when it reads like one.
   */
  private nestFields(level: Level, params: unknown[]): { context?: string; stack?: string } {
    const strings = params.filter((param): param is string => typeof param === 'string');

    if (level === 'error' && strings.length >= 2) {
      return { stack: strings[0], context: strings[strings.length - 1] };
    }
    if (strings.length === 1) {
      if (level === 'error' && STACK_TRACE.test(strings[0])) {
        return { stack: strings[0], context: this.context };
      }
      return { context: strings[0] };
    }
    return { context: this.context };
  }
}
