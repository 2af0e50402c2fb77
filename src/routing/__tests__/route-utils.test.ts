/**
 * route-utils.test.ts
 * Unit tests for naming, URL parts, custom verbs, format suffixes and conditions.
 */

import {
  applyFormatSuffix,
  basename,
  buildRouteName,
  buildUrlParts,
  composeCondition,
  extractPlaceholders,
  resolveCustomVerb,
} from '../route-utils.js';
import { param } from './helpers.js';

const pluralize = (word: string): string => `${word}s`;

describe('basename', () => {
  it('returns the last slash-delimited component', () => {
    expect(basename('blog/post')).toBe('post');
  });

  it('ignores trailing slashes', () => {
    expect(basename('blog/post/')).toBe('post');
  });

  it('returns the input when there is no slash', () => {
    expect(basename('post')).toBe('post');
  });
});

describe('buildRouteName', () => {
  it('joins basenames and skips null entries', () => {
    expect(buildRouteName(['post', null, 'blog/Comment'])).toBe('_post_Comment');
  });

  it('is empty for the anonymous root', () => {
    expect(buildRouteName([null])).toBe('');
  });
});

describe('buildUrlParts', () => {
  const options = { routePrefix: '', parentCount: 0, pluralize };

  it('maps arguments onto resources by index', () => {
    expect(buildUrlParts(['post', 'Comment'], [param('slug'), param('id')], 'get', options)).toEqual([
      'post/{slug}',
      'comment/{id}',
    ]);
  });

  it('keeps a trailing resource without argument singular for member verbs', () => {
    expect(buildUrlParts(['post', 'Comment'], [param('slug')], 'put', options)).toEqual([
      'post/{slug}',
      'comment',
    ]);
  });

  it('pluralizes for post and new', () => {
    expect(buildUrlParts(['Comment'], [], 'post', options)).toEqual(['comments']);
    expect(buildUrlParts(['Comment'], [], 'new', options)).toEqual(['comments']);
  });

  it('pluralizes for custom verbs without arguments', () => {
    expect(buildUrlParts(['post'], [], 'publish', options)).toEqual(['posts']);
  });

  it('emits a bare placeholder for the anonymous root', () => {
    expect(buildUrlParts([null], [param('id')], 'get', options)).toEqual(['{id}']);
    expect(buildUrlParts([null], [], 'get', options)).toEqual([]);
  });

  it('inserts the route prefix after the parent chain', () => {
    expect(
      buildUrlParts(['post', 'comment'], [param('slug'), param('id')], 'get', {
        routePrefix: 'api',
        parentCount: 1,
        pluralize,
      }),
    ).toEqual(['post/{slug}', 'api', 'comment/{id}']);
  });
});

describe('extractPlaceholders', () => {
  it('lists placeholders in order', () => {
    expect(extractPlaceholders('posts/{slug}/comments/{id}.{_format}')).toEqual(['slug', 'id', '_format']);
  });
});

describe('resolveCustomVerb', () => {
  it('dispatches conventional actions as get', () => {
    expect(resolveCustomVerb('edit', ['post'], [param('id')])).toBe('get');
    expect(resolveCustomVerb('remove', ['post'], [param('id')])).toBe('get');
  });

  it('dispatches collection-level custom actions as get', () => {
    expect(resolveCustomVerb('publish', ['post'], [])).toBe('get');
  });

  it('dispatches member-level custom actions as patch', () => {
    expect(resolveCustomVerb('lock', ['post'], [param('id')])).toBe('patch');
  });
});

describe('applyFormatSuffix', () => {
  it('returns the inputs unchanged when disabled', () => {
    expect(applyFormatSuffix('posts', {}, false, { json: 'application/json' })).toEqual({
      path: 'posts',
      requirements: {},
    });
  });

  it('appends the placeholder and constrains it to the known formats', () => {
    expect(applyFormatSuffix('posts', {}, true, { json: 'application/json', xml: 'text/xml' })).toEqual({
      path: 'posts.{_format}',
      requirements: { _format: 'json|xml' },
    });
  });

  it('keeps an explicit format requirement', () => {
    expect(applyFormatSuffix('posts', { _format: 'json' }, true, { json: 'a', xml: 'b' })).toEqual({
      path: 'posts.{_format}',
      requirements: { _format: 'json' },
    });
  });

  it('leaves the placeholder unconstrained without known formats', () => {
    expect(applyFormatSuffix('posts', {}, true, {})).toEqual({ path: 'posts.{_format}', requirements: {} });
  });

  it('does not modify the given requirements', () => {
    const requirements = { id: '\\d+' };
    applyFormatSuffix('posts/{id}', requirements, true, { json: 'a' });
    expect(requirements).toEqual({ id: '\\d+' });
  });
});

describe('composeCondition', () => {
  it('ANDs the annotation condition with the version predicate', () => {
    expect(composeCondition("request.headers.get('X') == 'y'", 'v2')).toBe(
      "(request.headers.get('X') == 'y') and request.attributes.get('version') == 'v2'",
    );
  });

  it('uses the bare predicate without an annotation condition', () => {
    expect(composeCondition(null, 'v2')).toBe("request.attributes.get('version') == 'v2'");
  });

  it('returns the condition untouched without a version', () => {
    expect(composeCondition('true', null)).toBe('true');
    expect(composeCondition(null, null)).toBeNull();
  });
});
