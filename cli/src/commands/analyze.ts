import fs from 'fs-extra';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage, JobStatus, pollUntilTerminal, toStatusView } from '@veriframe/core';
import { openVeriframe, PipelineOptions } from '../context';
import { formatProgress, renderReportText } from '../display';
import { describeMediaFile } from '../media';

interface AnalyzeOptions extends PipelineOptions {
  mime?: string;
  json?: boolean;
  report?: string;
}

export async function analyzeCommand(file: string, options: AnalyzeOptions) {
  const spinner = ora('Preparing media...').start();

  try {
    const media = await describeMediaFile(file, options.mime);
    const veriframe = openVeriframe(options);

    spinner.text = 'Submitting analysis job...';
    const outcome = await veriframe.analyze(media);
    const jobId = outcome.job.id;
    if (!outcome.accepted) {
      // Another process owns the run; follow it instead
      spinner.text = `Following job ${jobId} (${outcome.job.status})...`;
    }

    const final = await pollUntilTerminal(
      async () => {
        const job = await veriframe.store.get(jobId);
        return job ? toStatusView(job) : null;
      },
      {
        jobId,
        intervalMs: 100,
        // A followed job may have lost its process; stop rather than spin
        maxWaitMs: outcome.accepted ? undefined : veriframe.config.timeoutMs ?? veriframe.config.staleAfterMs,
        onUpdate: (view) => {
          spinner.text = formatProgress(view);
        }
      }
    );
    await veriframe.waitFor(jobId);

    if (final.status === JobStatus.FAILED) {
      spinner.fail(`Analysis failed during ${final.stage}: ${final.errorMessage ?? 'unknown error'}`);
      console.log(chalk.gray('Job:'), jobId);
      process.exit(1);
    }

    spinner.succeed(`Analysis complete (job ${jobId})`);

    const report = await veriframe.report(jobId);

    if (options.report) {
      await fs.outputJson(options.report, report, { spaces: 2 });
      console.error(chalk.gray('Report written to:'), options.report);
    }

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log('\n' + renderReportText(report) + '\n');
    }
  } catch (error) {
    spinner.fail(`Analysis failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}
