import chalk from 'chalk';

export type DebugLog = (message: string) => void;

export function createDebugLog(enabled: boolean): DebugLog {
  if (!enabled) return () => undefined;
  return (message) => console.error(chalk.dim(message));
}
