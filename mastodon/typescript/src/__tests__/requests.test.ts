/**
 * Tests for request validation and wire encoding.
 */

import { ConfigurationError, RequestEncoder, ValidationError } from '../index.js';
import type { EncodedBody, RequestInput } from '../index.js';
import { flattenPairs } from '../requests/index.js';

function formOf(body: EncodedBody): FormData {
  if (body.encoding !== 'multipart') {
    throw new Error(`expected a multipart body, got ${body.encoding}`);
  }
  return body.payload;
}

describe('RequestEncoder', () => {
  describe('JSON bodies', () => {
    const encoder = new RequestEncoder('3.3.0');

    it('should send only the fields that were set', () => {
      expect(
        encoder.toBody('new_status', {
          status: 'Hello',
          spoiler_text: undefined,
          visibility: 'unlisted',
        })
      ).toEqual({
        encoding: 'json',
        contentType: 'application/json',
        payload: '{"status":"Hello","visibility":"unlisted"}',
      });
    });

    it('should send an explicit null for nullable fields', () => {
      const body = encoder.toBody('add_filter', {
        phrase: 'spoiler',
        context: ['home'],
        expires_in: null,
      });
      expect(body).toEqual({
        encoding: 'json',
        contentType: 'application/json',
        payload: '{"phrase":"spoiler","context":["home"],"expires_in":null}',
      });
    });

    it('should reject null for a field that is not nullable', () => {
      expect(() => encoder.toBody('new_status', { status: null })).toThrow(
        'Validation failed: new_status.status: Expected string, received null'
      );
    });

    it('should reject a missing required field', () => {
      expect(() => encoder.toBody('list_request', {})).toThrow(ValidationError);
      expect(() => encoder.toBody('list_request', {})).toThrow(
        'Validation failed: list_request.title: Required'
      );
    });

    it('should encode nested requests as nested objects', () => {
      const body = encoder.toBody('markers_update', { home: { last_read_id: '42' } });
      expect(body).toEqual({
        encoding: 'json',
        contentType: 'application/json',
        payload: '{"home":{"last_read_id":"42"}}',
      });
    });
  });

  describe('generation gating', () => {
    it('should drop fields the generation does not accept', () => {
      const body = new RequestEncoder('2.4.0').toBody('new_status', {
        status: 'Hi',
        poll: { options: ['a', 'b'], expires_in: 3600 },
      });
      expect(body).toEqual({
        encoding: 'json',
        contentType: 'application/json',
        payload: '{"status":"Hi"}',
      });
    });

    it('should reject enumeration members of an inactive flag', () => {
      const encoder = new RequestEncoder('3.0.0');
      expect(() =>
        encoder.toBody('add_filter', { phrase: 'x', context: ['account'] })
      ).toThrow(
        'Validation failed: add_filter.context.0: Expected one of: home, notifications, public, thread'
      );
    });

    it('should accept them once the flag is active', () => {
      const body = new RequestEncoder('3.1.0').toBody('add_filter', {
        phrase: 'x',
        context: ['account'],
      });
      expect(body).toEqual({
        encoding: 'json',
        contentType: 'application/json',
        payload: '{"phrase":"x","context":["account"]}',
      });
    });

    it('should refuse requests the generation does not have', () => {
      expect(() => new RequestEncoder('1.5.0').toBody('list_request', { title: 'x' })).toThrow(
        ConfigurationError
      );
    });
  });

  describe('query strings', () => {
    const encoder = new RequestEncoder('2.9.1');

    it('should write arrays with bracketed keys', () => {
      const params = encoder.toQuery('relationships_query', { id: ['1', '2'] });
      expect(params.getAll('id[]')).toEqual(['1', '2']);
      expect(params.toString()).toBe('id%5B%5D=1&id%5B%5D=2');
    });

    it('should write booleans and numbers as text', () => {
      const params = encoder.toQuery('timeline_query', { local: true, limit: 20 });
      expect(params.toString()).toBe('limit=20&local=true');
    });

    it('should omit unset parameters', () => {
      expect(encoder.toQuery('timeline_query', undefined).toString()).toBe('');
    });

    it('should validate enumeration members in queries', () => {
      const params = encoder.toQuery('notifications_query', { exclude_types: ['follow', 'poll'] });
      expect(params.getAll('exclude_types[]')).toEqual(['follow', 'poll']);
      expect(() =>
        encoder.toQuery('notifications_query', { exclude_types: ['follow_request'] })
      ).toThrow(ValidationError);
    });
  });

  describe('multipart bodies', () => {
    it('should flatten nested values into form fields', () => {
      const body = new RequestEncoder('2.4.0').toBody('update_credentials', {
        display_name: 'Alice',
        source: { privacy: 'private' },
        fields_attributes: [{ name: 'Site', value: 'https://alice.example' }],
        discoverable: true,
      });
      const form = formOf(body);
      expect(form.get('display_name')).toBe('Alice');
      expect(form.get('source[privacy]')).toBe('private');
      expect(form.get('fields_attributes[0][name]')).toBe('Site');
      expect(form.get('fields_attributes[0][value]')).toBe('https://alice.example');
      expect(form.has('discoverable')).toBe(false);
    });

    it('should attach files and write the focal point as "x,y"', () => {
      const body = new RequestEncoder('2.4.0').toBody('media_upload', {
        file: new Blob(['image-bytes'], { type: 'image/png' }),
        description: 'A cat',
        focus: { x: 0.5, y: -0.25 },
      });
      const form = formOf(body);
      expect(form.get('file')).toBeInstanceOf(Blob);
      expect(form.get('description')).toBe('A cat');
      expect(form.get('focus')).toBe('0.5,-0.25');
    });

    it('should reject a focal point outside the unit square', () => {
      expect(() =>
        new RequestEncoder('2.4.0').toBody('media_update', { focus: { x: 2, y: 0 } })
      ).toThrow(ValidationError);
    });
  });
});

describe('flattenPairs', () => {
  it('should index object items and bracket scalar items', () => {
    expect(flattenPairs({ a: [{ b: 1 }], c: ['x', 'y'], d: null, e: undefined })).toEqual([
      ['a[0][b]', '1'],
      ['c[]', 'x'],
      ['c[]', 'y'],
      ['d', ''],
    ]);
  });
});

describe('request types', () => {
  it('should follow the generation', () => {
    expectTypeOf<RequestInput<'new_status', '2.4.0'>>().not.toHaveProperty('poll');
    expectTypeOf<RequestInput<'new_status', '2.9.1'>>().toHaveProperty('poll');
    expectTypeOf<RequestInput<'list_request', '3.3.0'>['replies_policy']>().toEqualTypeOf<
      'followed' | 'list' | 'none' | undefined
    >();
  });
});
