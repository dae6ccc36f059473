import chalk from 'chalk';

export interface PipelineLogger {
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Console logger for the pipeline CLI. Output goes to the CI job log, so
 * it is plain lines prefixed with the scope.
 */
export function createLogger(scope: string): PipelineLogger {
  const prefix = chalk.dim(`[${scope}]`);
  return {
    step: message => console.log(`${prefix} ${chalk.cyan('→')} ${message}`),
    info: message => console.log(`${prefix} ${message}`),
    success: message => console.log(`${prefix} ${chalk.green('✓')} ${message}`),
    warn: message => console.warn(`${prefix} ${chalk.yellow('!')} ${message}`),
    error: message => console.error(`${prefix} ${chalk.red('✗')} ${message}`)
  };
}
