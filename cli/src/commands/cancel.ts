import chalk from 'chalk';
import inquirer from 'inquirer';
import { errorMessage } from '@veriframe/core';
import { openVeriframe, StoreOptions } from '../context';

interface CancelOptions extends StoreOptions {
  yes?: boolean;
  reason?: string;
}

export async function cancelCommand(jobId: string, options: CancelOptions) {
  try {
    const veriframe = openVeriframe(options);
    const current = await veriframe.status(jobId);

    if (!options.yes) {
      const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([{
        type: 'confirm',
        name: 'confirmed',
        message: `Cancel job ${jobId} (currently ${current.status}, ${current.stage})?`,
        default: false
      }]);
      if (!confirmed) {
        console.log(chalk.gray('Nothing changed.'));
        return;
      }
    }

    const { cancelled, job } = await veriframe.cancel(jobId, options.reason);
    if (cancelled) {
      console.log(chalk.green('\n✓ Job cancelled'), chalk.gray(`(stopped at ${job.stage})`));
      console.log();
    } else {
      console.log(chalk.yellow(`⚠ Job ${jobId} already finished as ${job.status}; nothing to cancel.`));
    }
  } catch (error) {
    console.error(chalk.red('Cancel failed:'), errorMessage(error));
    process.exit(1);
  }
}
