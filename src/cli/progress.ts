/**
 * deckmedia ProgressReporter
 *
 * Structured console lines for long-running CLI operations.
 */

import { ErrorHandler } from '../errors/index.js';
import type { ExportResult } from '../model/types.js';

export class ProgressReporter {
  startTask(name: string): void {
    console.log(`⏳ ${name}...`);
  }

  completeTask(name: string): void {
    console.log(`✅ ${name}`);
  }

  failTask(name: string, err: unknown): void {
    console.error(`❌ ${name}: ${ErrorHandler.toUserMessage(err)}`);
  }

  logInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }

  /** One line per finished presentation or failed container. */
  reportResult(result: ExportResult): void {
    const name = result.subject.kind === 'presentation'
      ? result.subject.name ?? result.subject.id
      : `folder ${result.subject.id}`;
    if (result.errors.length === 0) {
      this.completeTask(`${name} (${result.artifacts.length} file(s))`);
    } else {
      this.failTask(name, result.errors[0].error);
    }
  }
}
