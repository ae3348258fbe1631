import * as core from '@actions/core';
import chalk from 'chalk';

/**
 * Where log lines end up. The action writes workflow commands, the CLI plain lines.
 */
export interface LogSink {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  group<T>(name: string, fn: () => Promise<T>): Promise<T>;
}

/**
 * Sink over @actions/core (annotations, `::debug::`, collapsible groups)
 */
export const actionsSink: LogSink = {
  info: message => core.info(message),
  warning: message => core.warning(message),
  error: message => core.error(message),
  debug: message => core.debug(message),
  group: (name, fn) => core.group(name, fn),
};

/**
 * Plain terminal output with coloured levels. Debug lines only reach it
 * through Logger in debug mode, so its own debug channel is dropped.
 */
export class ConsoleSink implements LogSink {
  constructor(private readonly colors: chalk.Chalk = chalk) {}

  info(message: string): void {
    console.log(message);
  }

  warning(message: string): void {
    console.warn(`${this.colors.yellow('warning')} ${message}`);
  }

  error(message: string): void {
    console.error(`${this.colors.red('error')} ${message}`);
  }

  debug(): void {}

  async group<T>(name: string, fn: () => Promise<T>): Promise<T> {
    console.log(this.colors.bold(name));
    return fn();
  }
}

export class Logger {
  public readonly verbose: boolean;
  public readonly debugMode: boolean;
  private readonly sink: LogSink;

  constructor(verbose: boolean = false, debugMode: boolean = false, sink: LogSink = actionsSink) {
    this.verbose = verbose || debugMode;
    this.debugMode = debugMode;
    this.sink = sink;
  }

  info(message: string): void {
    this.sink.info(message);
  }

  warning(message: string): void {
    this.sink.warning(message);
  }

  error(message: string): void {
    this.sink.error(message);
  }

  /**
   * Only shown when verbose is true
   */
  verboseInfo(message: string): void {
    if (this.verbose) {
      this.sink.info(message);
    }
  }

  /**
   * Printed with a [DEBUG] prefix in debug mode, otherwise handed to the sink's
   * debug channel (core.debug in a runner, dropped on the terminal)
   */
  debug(message: string): void {
    if (this.debugMode) {
      this.sink.info(`[DEBUG] ${message}`);
    } else {
      this.sink.debug(message);
    }
  }

  /**
   * Run fn inside a collapsible log group
   */
  async group<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return this.sink.group(name, fn);
  }
}
