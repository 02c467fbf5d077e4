/** Spec identifier templates: `{project}`, `{component}`, `{NNN}` and `{slug}` placeholders. */

export interface SpecIdSettings {
  template: string;
  padding: number;
  project?: string | null;
  components: string[];
}

export interface SpecIdParts {
  component: string | null;
  number: number;
  slug: string;
}

const MAX_SLUG_WORDS = 4;

/** Lowercase, hyphenated slug of the first few words of a title. */
export function slugify(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, ' ')
    .split(/[\s-]+/)
    .filter(Boolean)
    .slice(0, MAX_SLUG_WORDS)
    .join('-');
}

export function requiresComponent(settings: SpecIdSettings): boolean {
  return settings.template.includes('{component}');
}

export function generateSpecId(
  settings: SpecIdSettings,
  number: number,
  slug: string,
  component?: string | null,
): string {
  const padded = String(number).padStart(settings.padding, '0');
  let result = settings.template.replace('{NNN}', padded).replace('{slug}', slug);

  result = settings.project
    ? result.replace('{project}', settings.project)
    : result.replace('{project}-', '').replace('{project}', '');

  result = component
    ? result.replace('{component}', component.toUpperCase())
    : result.replace('{component}-', '').replace('{component}', '');

  return result.replace(/-+/g, '-').replace(/^-|-$/g, '');
}

/**
 * Split an id shaped like `CORE-001-user-auth` (or `001-user-auth` without a
 * component). Returns null for ids that carry no number segment.
 */
export function parseSpecId(id: string): SpecIdParts | null {
  const withComponent = /^([A-Z][A-Z0-9_]*)-(\d+)(?:-(.+))?$/.exec(id);
  if (withComponent) {
    return {
      component: withComponent[1],
      number: parseInt(withComponent[2], 10),
      slug: withComponent[3] ?? '',
    };
  }
  const bare = /^(\d+)(?:-(.+))?$/.exec(id);
  if (bare) {
    return { component: null, number: parseInt(bare[1], 10), slug: bare[2] ?? '' };
  }
  return null;
}

/** Next free number for a component, one past the highest existing id. */
export function nextSpecNumber(existingIds: Iterable<string>, component: string | null): number {
  const wanted = component?.toUpperCase() ?? null;
  let max = 0;
  for (const id of existingIds) {
    const parts = parseSpecId(id);
    if (!parts) continue;
    if (wanted !== null && parts.component !== wanted) continue;
    max = Math.max(max, parts.number);
  }
  return max + 1;
}

export function isKnownComponent(settings: SpecIdSettings, component: string): boolean {
  if (settings.components.length === 0) return true;
  const upper = component.toUpperCase();
  return settings.components.some((c) => c.toUpperCase() === upper);
}
