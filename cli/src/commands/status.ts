import chalk from 'chalk';
import ora from 'ora';
import { errorMessage, JobNotFoundError, pollUntilTerminal, toStatusView } from '@veriframe/core';
import { openVeriframe, StoreOptions } from '../context';
import { formatProgress, formatStatus } from '../display';

interface StatusOptions extends StoreOptions {
  json?: boolean;
  watch?: boolean;
  interval?: string;
}

export async function statusCommand(jobId: string, options: StatusOptions) {
  try {
    const veriframe = openVeriframe(options);

    if (options.watch) {
      const spinner = ora('Waiting for status...').start();
      const intervalMs = options.interval ? Number(options.interval) : 500;
      const final = await pollUntilTerminal(
        async () => {
          const job = await veriframe.store.get(jobId);
          return job ? toStatusView(job) : null;
        },
        {
          jobId,
          intervalMs: Number.isFinite(intervalMs) && intervalMs > 0 ? intervalMs : 500,
          onUpdate: (view) => {
            spinner.text = formatProgress(view);
          }
        }
      );
      spinner.stop();
      printStatus(formatStatus(final), final, options.json);
      return;
    }

    const view = await veriframe.status(jobId);
    printStatus(formatStatus(view), view, options.json);
  } catch (error) {
    if (error instanceof JobNotFoundError) {
      console.error(chalk.red(`Job not found: ${jobId}`));
    } else {
      console.error(chalk.red('Status query failed:'), errorMessage(error));
    }
    process.exit(1);
  }
}

function printStatus(lines: string[], view: object, json?: boolean) {
  if (json) {
    console.log(JSON.stringify(view, null, 2));
    return;
  }
  console.log();
  lines.forEach((line) => console.log(line));
  console.log();
}
