import pc from 'picocolors';
import type { ProvisionReport, StageResult } from '@provisioner/shared';
import { stageLabel } from '@provisioner/core';

function stageIcon(result: StageResult): string {
  if (result.outcome === 'skipped') return pc.gray('-');
  if (result.outcome === 'failure') {
    return result.severity === 'fatal' ? pc.red('✖') : pc.yellow('!');
  }
  return result.severity === 'warning' ? pc.yellow('✔') : pc.green('✔');
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(report: ProvisionReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      this.renderHuman(report);
    }
  }

  private renderHuman(report: ProvisionReport): void {
    if (report.classification === 'fatal') {
      console.log(`\n${pc.red('❌ Provisioning failed.')}`);
      if (report.fatal) {
        console.log(`  ${pc.bold('Stage:')} ${stageLabel(report.fatal.stage)}`);
        console.log(`  ${pc.bold('Error:')} ${report.fatal.message}`);
      }
    } else if (report.classification === 'cancelled') {
      console.log(`\n${pc.yellow('⚠ Provisioning cancelled.')}`);
    } else if (report.warnings.length > 0) {
      console.log(`\n${pc.yellow(`✅ Provisioning completed with ${report.warnings.length} warning(s).`)}`);
    } else {
      console.log(`\n${pc.green('✅ Provisioning succeeded.')}`);
    }

    console.log(pc.bold('\nStages:'));
    for (const result of report.stages) {
      const detail = result.diagnostic ? pc.gray(` ${result.diagnostic}`) : '';
      const duration = result.outcome === 'skipped' ? '' : ` (${result.durationMs}ms)`;
      console.log(`  ${stageIcon(result)} ${stageLabel(result.stage)}${duration}${detail}`);
    }

    if (report.warnings.length > 0) {
      console.log(pc.bold('\nWarnings:'));
      report.warnings.forEach((warning) => console.log(`  - ${warning}`));
    }

    if (report.executable) {
      const executable =
        report.executable.kind === 'resolved'
          ? report.executable.path
          : `${report.executable.name} (OS lookup)`;
      console.log(`\n${pc.bold('Package manager:')} ${executable}`);
    }
    console.log(`${pc.bold('Run ID:')} ${report.runId}`);
    console.log(`${pc.bold('Exit code:')} ${report.exitCode}`);
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }
}
