import type { SyncDirection } from 'specloom-core';
import { edgeLine, formatGraphCheck, formatIdList, formatSyncReport } from '../format.js';
import { print, printJson, withService, type GlobalOptions } from '../workspace.js';

export async function runDepAdd(specId: string, dependsOn: string, options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const edge = service.addDependency(specId, dependsOn);
    if (options.json) printJson(edge);
    else print(`Added ${edgeLine(edge)}`);
  });
}

export async function runDepRemove(specId: string, dependsOn: string, options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    service.removeDependency(specId, dependsOn);
    if (options.json) printJson({ dependent: specId, dependency: dependsOn });
    else print(`Removed ${specId} --> ${dependsOn}`);
  });
}

export async function runDepCheck(options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const report = service.checkGraph();
    if (options.json) {
      printJson({ ...report, cycles: report.cycles.map((c) => c.path) });
    } else {
      print(formatGraphCheck(report));
    }
    if (!report.ok) process.exitCode = 1;
  });
}

export async function runDepShow(options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    print(service.renderGraph());
  });
}

export interface DepSyncOptions extends GlobalOptions {
  direction?: SyncDirection;
  prune?: boolean;
}

export async function runDepSync(options: DepSyncOptions): Promise<void> {
  await withService(options, (service) => {
    const { report, written } = service.syncGraph({ direction: options.direction, prune: options.prune });
    if (options.json) {
      printJson({
        written,
        report: report ? { ...report, cycles: report.cycles.map((c) => c.path) } : null,
      });
    } else {
      print(formatSyncReport(report, written));
    }
  });
}

export async function runDependents(specId: string, options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const ids = service.dependents(specId);
    if (options.json) printJson(ids);
    else print(formatIdList(ids, `Nothing depends on ${specId}.`));
  });
}
