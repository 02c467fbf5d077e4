import type { SpecStatus, SpecWeight } from 'specloom-core';
import { formatEvents, formatProgress, formatSpecList, formatVelocity } from '../format.js';
import { print, printJson, withService, type GlobalOptions } from '../workspace.js';

export interface SpecAddOptions extends GlobalOptions {
  component?: string;
  weight?: SpecWeight;
  id?: string;
  path?: string;
}

export async function runSpecAdd(title: string, options: SpecAddOptions): Promise<void> {
  await withService(options, (service) => {
    const spec = service.registerSpec({
      title,
      component: options.component,
      weight: options.weight,
      id: options.id,
      specPath: options.path,
    });
    if (options.json) printJson(spec);
    else print(`Registered ${spec.id}`);
  });
}

export interface SpecStatusOptions extends GlobalOptions {
  force?: boolean;
}

export async function runSpecStatus(specId: string, status: SpecStatus, options: SpecStatusOptions): Promise<void> {
  await withService(options, (service) => {
    const spec = service.setSpecStatus(specId, status, { force: options.force });
    if (options.json) printJson(spec);
    else print(`${spec.id} is ${spec.status}${options.force ? ' (forced)' : ''}`);
  });
}

export async function runSpecArchive(specId: string, options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const spec = service.archiveSpec(specId);
    if (options.json) printJson(spec);
    else print(`Archived ${spec.id}`);
  });
}

export async function runSpecProgress(specId: string, options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const report = service.specProgress(specId);
    if (options.json) printJson(report);
    else print(formatProgress(report));
  });
}

export interface SpecListOptions extends GlobalOptions {
  all?: boolean;
  component?: string;
}

export async function runSpecList(options: SpecListOptions): Promise<void> {
  await withService(options, (service) => {
    const specs = service.listSpecs({
      includeArchived: options.all,
      component: options.component?.toUpperCase(),
    });
    if (options.json) printJson(specs);
    else print(formatSpecList(specs));
  });
}

export async function runEvents(specId: string | undefined, options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const events = service.events(specId);
    if (options.json) printJson(events);
    else print(formatEvents(events));
  });
}

export interface VelocityOptions extends GlobalOptions {
  days?: number;
}

export async function runVelocity(options: VelocityOptions): Promise<void> {
  await withService(options, (service) => {
    const points = service.velocity(options.days);
    if (options.json) printJson(points);
    else print(formatVelocity(points));
  });
}

export async function runMigrate(options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const result = service.store.remigrate();
    if (result.error) throw result.error;
    if (options.json) printJson({ ...result, history: service.store.listMigrations() });
    else if (result.applied.length === 0) print(`Schema is current (v${result.to})`);
    else print(`Applied migrations ${result.applied.join(', ')}; schema is v${result.to}`);
  });
}
