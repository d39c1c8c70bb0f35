import chalk from 'chalk';
import { errorMessage } from '@veriframe/core';
import { openVeriframe, StoreOptions } from '../context';
import { formatResult } from '../display';

interface ResultOptions extends StoreOptions {
  json?: boolean;
}

export async function resultCommand(jobId: string, options: ResultOptions) {
  try {
    const view = await openVeriframe(options).result(jobId);

    if (options.json) {
      console.log(JSON.stringify(view, null, 2));
    } else {
      console.log();
      formatResult(view).forEach((line) => console.log(line));
      console.log();
    }

    // Not ready and failed are both non-zero so scripts can branch on them
    process.exit(view.state === 'ready' ? 0 : view.state === 'not_ready' ? 2 : 1);
  } catch (error) {
    console.error(chalk.red('Result query failed:'), errorMessage(error));
    process.exit(1);
  }
}
