/**
 * Tests for the endpoint registry.
 */

import { ENDPOINTS, GENERATIONS, ValidationError, activeEndpoints, isFlagActive } from '../index.js';
import type {
  ActiveEndpointName,
  EndpointArgs,
  EndpointResult,
  PagedEndpointName,
  PagedItem,
  Relationship,
  Status,
} from '../index.js';
import {
  assertRegistryConsistent,
  endpointDefinition,
  expandPath,
  isEndpointName,
  pathParamNames,
} from '../endpoints/index.js';
import type { EndpointCallArgs, PathParamNames } from '../endpoints/index.js';

describe('endpoint registry', () => {
  it('should expose exactly the endpoints whose flag is active', () => {
    const names = Object.keys(ENDPOINTS).filter(isEndpointName);
    for (const generation of GENERATIONS) {
      const expected = names.filter((name) =>
        isFlagActive(endpointDefinition(name).flag, generation)
      );
      expect(activeEndpoints(generation)).toEqual(expected);
    }
  });

  it('should be consistent with the entity and request models at every generation', () => {
    for (const generation of GENERATIONS) {
      expect(() => assertRegistryConsistent(generation)).not.toThrow();
    }
  });

  it('should leave later endpoints out of the oldest generation', () => {
    const surface = activeEndpoints('1.5.0');
    expect(surface).toContain('statuses.get');
    expect(surface).not.toContain('push.get');
    expect(surface).not.toContain('lists.list');
    expect(surface).not.toContain('announcements.list');
  });

  it('should drop retired endpoints', () => {
    expect(activeEndpoints('2.9.1')).toContain('search.v1');
    expect(activeEndpoints('3.0.0')).not.toContain('search.v1');
    expect(activeEndpoints('3.0.0')).toContain('search.v2');
  });

  it('should swap the notification dismissal endpoint at 3.1.0', () => {
    expect(activeEndpoints('3.0.0')).toContain('notifications.dismiss_legacy');
    expect(activeEndpoints('3.0.0')).not.toContain('notifications.dismiss');
    expect(activeEndpoints('3.1.0')).not.toContain('notifications.dismiss_legacy');
    expect(activeEndpoints('3.1.0')).toContain('notifications.dismiss');
  });

  it('should recognise declared names only', () => {
    expect(isEndpointName('timelines.home')).toBe(true);
    expect(isEndpointName('timelines.bubble')).toBe(false);
  });
});

describe('path templates', () => {
  it('should list parameters in order', () => {
    expect(pathParamNames('/api/v1/announcements/:id/reactions/:name')).toEqual(['id', 'name']);
    expect(pathParamNames('/api/v1/timelines/home')).toEqual([]);
  });

  it('should encode parameter values', () => {
    expect(
      expandPath('timelines.tag', '/api/v1/timelines/tag/:hashtag', { hashtag: 'café au lait' })
    ).toBe('/api/v1/timelines/tag/caf%C3%A9%20au%20lait');
    expect(expandPath('accounts.get', '/api/v1/accounts/:id', { id: 'a/b' })).toBe(
      '/api/v1/accounts/a%2Fb'
    );
  });

  it('should accept numeric values', () => {
    expect(expandPath('statuses.get', '/api/v1/statuses/:id', { id: 42 })).toBe(
      '/api/v1/statuses/42'
    );
  });

  it('should reject missing or empty parameters', () => {
    const path = '/api/v1/announcements/:id/reactions/:name';
    expect(() => expandPath('announcements.add_reaction', path, { id: '1' })).toThrow(
      ValidationError
    );
    expect(() => expandPath('announcements.add_reaction', path, { id: '', name: '' })).toThrow(
      'Validation failed: announcements.add_reaction.id: Required, announcements.add_reaction.name: Required'
    );
  });

  it('should reject dot segments that URL parsing would resolve away', () => {
    expect(() => expandPath('statuses.delete', '/api/v1/statuses/:id', { id: '..' })).toThrow(
      'Validation failed: statuses.delete.id: Invalid path segment ".."'
    );
    expect(() => expandPath('statuses.delete', '/api/v1/statuses/:id', { id: '.' })).toThrow(
      ValidationError
    );
    expect(expandPath('statuses.get', '/api/v1/statuses/:id', { id: '...' })).toBe(
      '/api/v1/statuses/...'
    );
  });
});

describe('endpoint types', () => {
  it('should gate endpoint names by generation', () => {
    expectTypeOf<'statuses.get'>().toMatchTypeOf<ActiveEndpointName<'1.5.0'>>();
    expectTypeOf<'push.get'>().not.toMatchTypeOf<ActiveEndpointName<'1.5.0'>>();
    expectTypeOf<'push.get'>().toMatchTypeOf<ActiveEndpointName<'2.4.0'>>();
    expectTypeOf<'search.v1'>().not.toMatchTypeOf<ActiveEndpointName<'3.0.0'>>();
  });

  it('should only list paginated endpoints as paged', () => {
    expectTypeOf<'timelines.home'>().toMatchTypeOf<PagedEndpointName<'3.3.0'>>();
    expectTypeOf<'statuses.get'>().not.toMatchTypeOf<PagedEndpointName<'3.3.0'>>();
  });

  it('should read path parameters from the template', () => {
    expectTypeOf<PathParamNames<'/api/v1/timelines/tag/:hashtag'>>().toEqualTypeOf<'hashtag'>();
    expectTypeOf<
      PathParamNames<'/api/v1/announcements/:id/reactions/:name'>
    >().toEqualTypeOf<'id' | 'name'>();
    expectTypeOf<EndpointArgs<'statuses.get', '3.3.0'>>().toEqualTypeOf<{ readonly id: string }>();
  });

  it('should make the arguments optional when nothing is required', () => {
    expectTypeOf<[]>().toMatchTypeOf<EndpointCallArgs<'timelines.home', '3.3.0'>>();
    expectTypeOf<[]>().not.toMatchTypeOf<EndpointCallArgs<'statuses.get', '3.3.0'>>();
  });

  it('should type results by generation', () => {
    expectTypeOf<EndpointResult<'statuses.get', '2.1.0'>>().toEqualTypeOf<Status<'2.1.0'>>();
    expectTypeOf<EndpointResult<'accounts.relationships', '3.3.0'>>().toEqualTypeOf<
      Relationship<'3.3.0'>[]
    >();
    expectTypeOf<PagedItem<'timelines.home', '3.3.0'>>().toEqualTypeOf<Status<'3.3.0'>>();
    expectTypeOf<EndpointResult<'instance.peers', '1.5.0'>>().toEqualTypeOf<string[]>();
  });
});
