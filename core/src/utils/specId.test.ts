import { describe, it, expect } from 'vitest';
import {
  generateSpecId,
  isKnownComponent,
  nextSpecNumber,
  parseSpecId,
  requiresComponent,
  slugify,
  type SpecIdSettings,
} from './specId.js';

const defaults: SpecIdSettings = {
  template: '{component}-{NNN}-{slug}',
  padding: 3,
  components: [],
};

describe('slugify', () => {
  it('keeps the first four words, lowercased and hyphenated', () => {
    expect(slugify('Add User Authentication & Sessions now')).toBe('add-user-authentication-sessions');
  });

  it('collapses punctuation and repeated separators', () => {
    expect(slugify('  Rate--limit: API  ')).toBe('rate-limit-api');
  });
});

describe('generateSpecId', () => {
  it('fills the default template with an uppercased component', () => {
    expect(generateSpecId(defaults, 1, 'user-auth', 'core')).toBe('CORE-001-user-auth');
  });

  it('drops the component placeholder when none is given', () => {
    expect(generateSpecId({ ...defaults, template: '{NNN}-{slug}' }, 7, 'setup')).toBe('007-setup');
    expect(generateSpecId(defaults, 12, 'setup', null)).toBe('012-setup');
  });

  it('includes the project when configured and drops it otherwise', () => {
    const template = '{project}-{component}-{NNN}-{slug}';
    expect(generateSpecId({ ...defaults, template, project: 'acme' }, 12, 'rate-limit', 'api'))
      .toBe('acme-API-012-rate-limit');
    expect(generateSpecId({ ...defaults, template }, 1, 'x', 'core')).toBe('CORE-001-x');
  });

  it('honours the padding width', () => {
    expect(generateSpecId({ ...defaults, padding: 5 }, 42, 'wide', 'ui')).toBe('UI-00042-wide');
  });
});

describe('parseSpecId', () => {
  it('splits component, number and slug', () => {
    expect(parseSpecId('CORE-001-user-auth')).toEqual({ component: 'CORE', number: 1, slug: 'user-auth' });
    expect(parseSpecId('API-010')).toEqual({ component: 'API', number: 10, slug: '' });
  });

  it('accepts ids without a component', () => {
    expect(parseSpecId('007-setup')).toEqual({ component: null, number: 7, slug: 'setup' });
  });

  it('returns null when there is no number segment', () => {
    expect(parseSpecId('readme')).toBeNull();
    expect(parseSpecId('core-001-lowercase')).toBeNull();
  });
});

describe('nextSpecNumber', () => {
  const ids = ['CORE-001-a', 'CORE-003-b', 'API-009-c', 'notes'];

  it('allocates one past the highest number of the component', () => {
    expect(nextSpecNumber(ids, 'core')).toBe(4);
    expect(nextSpecNumber(ids, 'WEB')).toBe(1);
  });

  it('considers every id when no component is given', () => {
    expect(nextSpecNumber(ids, null)).toBe(10);
  });
});

describe('components', () => {
  it('accepts any component when none are configured', () => {
    expect(isKnownComponent(defaults, 'anything')).toBe(true);
  });

  it('matches configured components case-insensitively', () => {
    const settings = { ...defaults, components: ['CORE', 'API'] };
    expect(isKnownComponent(settings, 'api')).toBe(true);
    expect(isKnownComponent(settings, 'web')).toBe(false);
  });

  it('detects templates that need a component', () => {
    expect(requiresComponent(defaults)).toBe(true);
    expect(requiresComponent({ ...defaults, template: '{NNN}-{slug}' })).toBe(false);
  });
});
