import path from 'node:path';
import { errorMessage, openWorkspace, type LifecycleService } from 'specloom-core';

export interface GlobalOptions {
  cwd?: string;
  quiet?: boolean;
  verbose?: boolean;
  json?: boolean;
}

/**
 * Open the project's workspace, run one command against it and close it again.
 * Failures print `Error: <message>` to stderr and set exit code 1.
 */
export async function withService(
  options: GlobalOptions,
  fn: (service: LifecycleService) => void | Promise<void>,
): Promise<void> {
  let service: LifecycleService | undefined;
  try {
    service = openWorkspace(path.resolve(options.cwd ?? process.cwd()), {
      // JSON output must stay parseable, so the console mirror goes quiet.
      quiet: options.quiet || options.json,
      verbose: options.verbose,
    });
    await fn(service);
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  } finally {
    service?.close();
  }
}

export function print(text: string): void {
  process.stdout.write(text.endsWith('\n') ? text : text + '\n');
}

export function printJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}
