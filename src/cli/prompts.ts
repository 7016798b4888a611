import chalk from 'chalk';
import inquirer from 'inquirer';
import kleur from 'kleur';
import type { CancelToken } from '../cancel.js';
import type { CopyPolicy } from '../config.js';
import { InvalidSelectionError } from '../errors.js';
import type { LockPrompter, LockReport, ManualCopyRequest } from '../profiles/lockResolver.js';
import { selectProfileByIndex, type ProfileDescriptor } from '../profiles/registry.js';
import { DEFAULT_SEARCH_COUNT, parseSearchCountInput } from './options.js';

export interface OperatorPrompter extends LockPrompter {
  chooseProfile(candidates: readonly ProfileDescriptor[]): Promise<ProfileDescriptor>;
  askSearchCount(defaultCount?: number): Promise<number>;
  choosePolicy(defaultPolicy: CopyPolicy): Promise<CopyPolicy>;
}

const LOCK_REASON_TEXT: Record<LockReport['reason'], string> = {
  'copy-failed': 'The copy failed for a reason other than a lock.',
  'no-inspector': 'No lock-inspection tool (lsof / Sysinternals handle) is installed, so the holder is unknown.',
  'inspector-failed': 'The lock-inspection tool failed, so the holder is unknown.',
  'no-holders': 'No process reported holding the file; it may have been released already.',
  'foreign-holders': 'A process other than Edge holds the file; close it yourself.',
  'auto-terminate-disabled': 'Automatic termination is disabled; close Edge yourself.',
  'termination-failed': 'Some Edge processes could not be terminated.',
};

export function formatLockReport(report: LockReport): string[] {
  const lines = [chalk.yellow(`Locked file: ${report.filePath}`), kleur.dim(report.detail), LOCK_REASON_TEXT[report.reason]];
  for (const holder of report.holders) {
    lines.push(`  held by ${holder.name || 'unknown'} (pid ${holder.pid})`);
  }
  for (const failure of report.terminationFailures) {
    if (!failure.ok) {
      lines.push(chalk.red(`  could not terminate pid ${failure.pid}: ${failure.error}`));
    }
  }
  return lines;
}

/** Validator shape inquirer expects: `true`, or the message to show before re-asking. */
export function validateWith(check: (input: string) => unknown): (input: string) => true | string {
  return (input) => {
    try {
      check(input);
      return true;
    } catch (error) {
      if (error instanceof InvalidSelectionError) {
        return error.message;
      }
      throw error;
    }
  };
}

export function createInquirerPrompter(token: CancelToken, write: (line: string) => void = (line) => console.log(line)): OperatorPrompter {
  return {
    async chooseProfile(candidates) {
      write(chalk.bold('Edge profiles:'));
      candidates.forEach((candidate, index) => write(`  ${index + 1}. ${candidate.name}`));
      const { selection } = await token.race(
        inquirer.prompt<{ selection: string }>([
          {
            name: 'selection',
            type: 'input',
            message: `Profile number (1-${candidates.length})`,
            default: '1',
            validate: validateWith((input) => selectProfileByIndex(candidates, input)),
          },
        ]),
      );
      return selectProfileByIndex(candidates, selection);
    },

    async askSearchCount(defaultCount = DEFAULT_SEARCH_COUNT) {
      const { count } = await token.race(
        inquirer.prompt<{ count: string }>([
          {
            name: 'count',
            type: 'input',
            message: 'How many searches?',
            default: String(defaultCount),
            validate: validateWith((input) => parseSearchCountInput(input, defaultCount)),
          },
        ]),
      );
      return parseSearchCountInput(count, defaultCount);
    },

    async choosePolicy(defaultPolicy) {
      const { policy } = await token.race(
        inquirer.prompt<{ policy: CopyPolicy }>([
          {
            name: 'policy',
            type: 'list',
            message: 'How should the working copy be made?',
            default: defaultPolicy,
            choices: [
              { name: 'I will copy the profile to "<profile>-temp" myself', value: 'operator-assisted' },
              { name: 'Copy it automatically to a temporary folder', value: 'automatic' },
            ],
          },
        ]),
      );
      return policy;
    },

    async confirmManualCopy(request: ManualCopyRequest) {
      if (request.attempt === 1) {
        write(`Copy ${chalk.cyan(request.sourceDir)}`);
        write(`  to ${chalk.cyan(request.expectedDir)}`);
      }
      const { action } = await token.race(
        inquirer.prompt<{ action: 'copied' | 'cancel' }>([
          {
            name: 'action',
            type: 'list',
            message: 'When the copy is in place:',
            default: 'copied',
            choices: [
              { name: 'Copied, check again', value: 'copied' },
              { name: 'Cancel the run', value: 'cancel' },
            ],
          },
        ]),
      );
      return action;
    },

    async acknowledgeLock(report: LockReport) {
      for (const line of formatLockReport(report)) {
        write(line);
      }
      const { action } = await token.race(
        inquirer.prompt<{ action: 'retry' | 'abort' }>([
          {
            name: 'action',
            type: 'list',
            message: 'Close the program holding the file, then:',
            choices: [
              { name: 'Retry the copy', value: 'retry' },
              { name: 'Abort', value: 'abort' },
            ],
          },
        ]),
      );
      return action;
    },
  };
}
