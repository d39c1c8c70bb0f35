#!/usr/bin/env node

import { program } from 'commander';
import chalk from 'chalk';
import { version } from '../package.json';
import { analyzeCommand } from './commands/analyze';
import { statusCommand } from './commands/status';
import { resultCommand } from './commands/result';
import { reportCommand } from './commands/report';
import { cancelCommand } from './commands/cancel';
import { stagesCommand } from './commands/stages';

const STORE_HELP = 'Job store directory (default: $VERIFRAME_STORE or .veriframe/jobs)';

program
  .name('veriframe')
  .description('Veriframe - CLI for staged deepfake analysis of video, audio and images')
  .version(version);

// Analyze command
program
  .command('analyze <file>')
  .description('Submit a media file and follow its analysis to the end')
  .option('-m, --mime <type>', 'Declared MIME type (default: from the file extension)')
  .option('--seed <seed>', 'Scoring seed')
  .option('-w, --weights <video,audio,lipsync>', 'Fusion weights, e.g. 0.5,0.3,0.2')
  .option('-d, --delay <ms>', 'Pause before each stage')
  .option('-t, --timeout <ms>', 'Fail the job once it runs longer than this')
  .option('-s, --store <dir>', STORE_HELP)
  .option('-r, --report <path>', 'Also write the JSON report to this path')
  .option('-j, --json', 'Output the report as JSON')
  .option('-v, --verbose', 'Log pipeline events')
  .action(analyzeCommand);

// Status command
program
  .command('status <jobId>')
  .description('Show the stage and progress of a job')
  .option('-s, --store <dir>', STORE_HELP)
  .option('-w, --watch', 'Poll until the job is done or failed')
  .option('-i, --interval <ms>', 'Polling interval for --watch', '500')
  .option('-j, --json', 'Output as JSON')
  .action(statusCommand);

// Result command
program
  .command('result <jobId>')
  .description('Show the verdict and scores of a finished job')
  .option('-s, --store <dir>', STORE_HELP)
  .option('-j, --json', 'Output as JSON')
  .action(resultCommand);

// Report command
program
  .command('report <jobId>')
  .description('Render the forensic report of a finished job')
  .option('-s, --store <dir>', STORE_HELP)
  .option('-o, --output <path>', 'Write the JSON report to a file')
  .option('-j, --json', 'Output as JSON')
  .action(reportCommand);

// Cancel command
program
  .command('cancel <jobId>')
  .description('Stop a pending or running job')
  .option('-s, --store <dir>', STORE_HELP)
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('--reason <text>', 'Message recorded on the job')
  .action(cancelCommand);

// Stages command
program
  .command('stages')
  .description('List the analysis stages and their progress values')
  .action(stagesCommand);

// Global error handler
process.on('unhandledRejection', (error) => {
  console.error(chalk.red('Error:'), error);
  process.exit(1);
});

program.parse();
