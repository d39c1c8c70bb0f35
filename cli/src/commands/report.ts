import fs from 'fs-extra';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage, ReportNotReadyError } from '@veriframe/core';
import { openVeriframe, StoreOptions } from '../context';
import { renderReportText } from '../display';

interface ReportOptions extends StoreOptions {
  output?: string;
  json?: boolean;
}

export async function reportCommand(jobId: string, options: ReportOptions) {
  const spinner = ora('Building report...').start();

  try {
    const report = await openVeriframe(options).report(jobId);
    spinner.stop();

    if (options.output) {
      await fs.outputJson(options.output, report, { spaces: 2 });
      console.log(chalk.green('\n✓ Report saved to:'), options.output);
      console.log();
      return;
    }

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log('\n' + renderReportText(report) + '\n');
    }
  } catch (error) {
    if (error instanceof ReportNotReadyError) {
      spinner.warn(error.message);
      process.exit(2);
    }
    spinner.fail(`Report failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}
