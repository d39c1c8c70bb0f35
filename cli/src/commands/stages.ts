import chalk from 'chalk';
import { formatStageTable } from '../display';

export function stagesCommand() {
  console.log('\n' + chalk.bold('Analysis stages:'));
  formatStageTable().forEach((line) => console.log('  ' + line));
  console.log();
}
