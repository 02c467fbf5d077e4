import { formatBlocked, formatIdList } from '../format.js';
import { print, printJson, withService, type GlobalOptions } from '../workspace.js';

export async function runReady(options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const ids = service.listReady();
    if (options.json) printJson(ids);
    else print(formatIdList(ids, 'No specs are ready.'));
  });
}

export async function runBlocked(options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const blocked = service.listBlocked();
    if (options.json) printJson(blocked);
    else print(formatBlocked(blocked));
  });
}

export async function runImpact(specId: string, options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const ids = service.impact(specId);
    if (options.json) printJson(ids);
    else print(formatIdList(ids, `Nothing depends on ${specId}.`));
  });
}

export async function runChain(specId: string, options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const ids = service.dependencyChain(specId);
    if (options.json) printJson(ids);
    else print(formatIdList(ids, `${specId} has no dependencies.`));
  });
}
