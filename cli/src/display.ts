import chalk from 'chalk';
import {
  ForensicReport,
  JobResultView,
  JobStatus,
  JobStatusView,
  progressFor,
  STAGE_SEQUENCE,
  stageLabel,
  toPercent,
  Verdict
} from '@veriframe/core';

const RULE = '='.repeat(60);

const MODALITY_TITLES = {
  video: 'Video',
  audio: 'Audio',
  lipsync: 'Lip-sync'
} as const;

export function verdictColor(verdict: Verdict): chalk.Chalk {
  switch (verdict) {
    case Verdict.AUTHENTIC:
      return chalk.green.bold;
    case Verdict.SUSPICIOUS:
      return chalk.yellow.bold;
    case Verdict.LIKELY_FAKE:
      return chalk.red.bold;
  }
}

function statusColor(status: JobStatus): chalk.Chalk {
  switch (status) {
    case JobStatus.DONE:
      return chalk.green;
    case JobStatus.FAILED:
      return chalk.red;
    case JobStatus.RUNNING:
      return chalk.cyan;
    default:
      return chalk.gray;
  }
}

export function progressBar(percent: number, width = 20): string {
  const filled = Math.round((Math.min(Math.max(percent, 0), 100) / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

/** Spinner text while a job runs */
export function formatProgress(view: JobStatusView): string {
  return `${progressBar(view.progressPercent)} ${String(view.progressPercent).padStart(3)}% ${view.label}`;
}

export function formatStatus(view: JobStatusView): string[] {
  const lines = [
    `${chalk.gray('Job:')} ${view.jobId}`,
    `${chalk.gray('Status:')} ${statusColor(view.status)(view.status.toUpperCase())}`,
    `${chalk.gray('Stage:')} ${view.stage}`,
    `${chalk.gray('Progress:')} ${formatProgress(view)}`,
    `${chalk.gray('Updated:')} ${view.updatedAt}`
  ];
  if (view.errorMessage) {
    lines.push(`${chalk.red('Error:')} ${view.errorMessage}`);
  }
  return lines;
}

export function formatResult(view: JobResultView): string[] {
  switch (view.state) {
    case 'not_ready':
      return [
        chalk.yellow(`Result not ready: job ${view.jobId} is ${view.status} (${view.stage}, ${view.progressPercent}%)`)
      ];
    case 'failed':
      return [
        chalk.red(`Analysis failed during ${view.stage}: ${view.errorMessage}`)
      ];
    case 'ready': {
      const lines = [
        `${chalk.gray('Job:')} ${view.jobId}`,
        `${chalk.gray('Verdict:')} ${verdictColor(view.verdict)(view.verdict)}`,
        `${chalk.gray('Overall score:')} ${view.overallPercent}%`
      ];
      for (const modality of ['video', 'audio', 'lipsync'] as const) {
        const analysis = view.result[modality];
        if (!analysis) continue;
        const score = analysis.applicable ? `${toPercent(analysis.score)}%` : chalk.gray('n/a');
        lines.push(`  ${MODALITY_TITLES[modality]}: ${score}`);
      }
      const runs = view.result.modelRuns ?? [];
      if (runs.length > 0) {
        lines.push(`${chalk.gray('Models:')} ${runs.map((run) => `${run.modelName}@${run.modelVersion}`).join(', ')}`);
      }
      lines.push(`${chalk.gray('Evidence segments:')} ${view.result.segments.length}`);
      return lines;
    }
  }
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

/** Plain-text rendering of a finished job's report. */
export function renderReportText(report: ForensicReport): string {
  const lines: string[] = [];
  lines.push(chalk.bold(RULE));
  lines.push(chalk.bold('  Deepfake Analysis Report'));
  lines.push(chalk.bold(RULE));
  lines.push('');
  lines.push(`${chalk.gray('Job:')} ${report.jobId}`);
  lines.push(`${chalk.gray('File:')} ${report.media.filename} (${report.media.mimeType})`);
  if (report.media.durationMs !== null) {
    lines.push(`${chalk.gray('Duration:')} ${formatSeconds(report.media.durationMs)}`);
  }
  if (report.media.resolution) {
    lines.push(`${chalk.gray('Resolution:')} ${report.media.resolution}`);
  }
  lines.push(`${chalk.gray('Generated:')} ${report.generatedAt}`);
  lines.push('');
  lines.push(`${chalk.gray('Verdict:')} ${verdictColor(report.verdict.label)(report.verdict.label)} (${report.verdict.overallPercent}%)`);
  lines.push(report.verdict.summary);
  lines.push('');
  lines.push(chalk.bold('Modality Scores:'));
  for (const modality of ['video', 'audio', 'lipsync'] as const) {
    const item = report.analysis[modality];
    const detail = item.applicable
      ? `${item.percent}% (confidence ${toPercent(item.confidence)}%)`
      : 'not applicable';
    const weight = report.weights ? ` weight ${report.weights[modality]}` : '';
    lines.push(`  ${MODALITY_TITLES[modality]}: ${detail}${weight}`);
  }
  if (report.agreement !== null) {
    lines.push(`${chalk.gray('Agreement:')} ${report.agreement}`);
  }

  if (report.concerns.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('⚠ Concerns:'));
    for (const concern of report.concerns) {
      lines.push(`${chalk.yellow('  •')} ${concern}`);
    }
  }

  if (report.segments.length > 0) {
    lines.push('');
    lines.push(chalk.bold('Evidence Segments:'));
    for (const segment of report.segments) {
      lines.push(
        `  ${formatSeconds(segment.startMs)}-${formatSeconds(segment.endMs)} ${segment.segmentType} ${toPercent(segment.score)}% ${segment.reason}`
      );
    }
  }

  lines.push('');
  lines.push(chalk.bold(RULE));
  return lines.join('\n');
}

export function formatStageTable(): string[] {
  return STAGE_SEQUENCE.map(
    (stage, index) => `${String(index + 1).padStart(2)}. ${stage.padEnd(13)} ${String(progressFor(stage)).padStart(3)}%  ${stageLabel(stage)}`
  );
}
