import chalk from 'chalk';
import axios from 'axios';
import { HoldingsDataError } from '../errors.js';

function errorCode(err: Error): unknown {
  return 'code' in err ? err.code : undefined;
}

export function handleError(err: unknown, source: string): void {
  if (err instanceof HoldingsDataError) {
    console.log(chalk.red(`Invalid holdings data (${source}): ${err.message}`));
  } else if (axios.isAxiosError(err)) {
    if (err.response) {
      console.log(chalk.red(`Request for ${source} failed with HTTP ${err.response.status}`));
    } else {
      console.log(chalk.red(`Network request for ${source} failed, check the connection and retry`));
    }
  } else if (err instanceof Error) {
    if (errorCode(err) === 'ENOENT') {
      console.log(chalk.red(`File not found: ${source}`));
    } else {
      console.log(chalk.red(`Error: ${err.message}`));
    }
  } else {
    console.log(chalk.red('Unknown error'));
  }
  process.exitCode = 1;
}
