/**
 * action-route-deriver.test.ts
 * Behavior tests for ActionRouteDeriver over hand-built method descriptors.
 *
 * Covers:
 *   - Convention routes (verbs, collections, custom verbs, parents, prefixes)
 *   - Dual registration of non-inflectable collections
 *   - Annotation layering, naming and version conditions
 *   - Eligibility and configuration errors
 */

import { BufferedLogger } from '../../services/logger.js';
import { ConfigurationError, createDeriverConfig } from '../deriver-config.js';
import { DuplicateRouteError, RestRouteCollection } from '../route-collection.js';
import { annotation, makeDeriver, method, param } from './helpers.js';

const config = createDeriverConfig();

// ---------------------------------------------------------------------------
// Convention routes
// ---------------------------------------------------------------------------

describe('ActionRouteDeriver: conventions', () => {
  it('derives a member route from the seed', () => {
    const collection = new RestRouteCollection();
    const names = makeDeriver().read(collection, method('getAction'), ['post'], config);

    expect(names).toEqual(['get_post']);
    expect(collection.get('get_post')).toEqual({
      path: 'post',
      defaults: { _controller: 'PostController::getAction' },
      requirements: {},
      options: {},
      host: '',
      schemes: [],
      methods: ['GET'],
      condition: null,
    });
  });

  it('routes new actions to the pluralized resource as GET', () => {
    const collection = new RestRouteCollection();
    makeDeriver().read(collection, method('newCommentAction'), [], config);

    const route = collection.get('new_comment');
    expect(route?.path).toBe('comments/new');
    expect(route?.methods).toEqual(['GET']);
  });

  it('names collection actions after the plural', () => {
    const collection = new RestRouteCollection();
    const names = makeDeriver().read(collection, method('cgetAction'), ['post'], config);

    expect(names).toEqual(['get_posts']);
    expect(collection.get('get_posts')?.path).toBe('posts');
  });

  it('nests under configured parents', () => {
    const collection = new RestRouteCollection();
    const parentConfig = createDeriverConfig({ parents: ['post'] });
    makeDeriver().read(collection, method('putCommentAction', [param('id')]), [], parentConfig);

    const route = collection.get('put_post_comment');
    expect(route?.path).toBe('post/{id}/comment');
    expect(route?.methods).toEqual(['PUT']);
  });

  it('places one placeholder per routable argument', () => {
    const collection = new RestRouteCollection();
    makeDeriver().read(collection, method('getCommentAction', [param('slug'), param('id')]), ['post'], config);

    expect(collection.get('get_post_comment')?.path).toBe('post/{slug}/comment/{id}');
  });

  it('skips framework-injected and query-bound parameters', () => {
    const collection = new RestRouteCollection();
    const m = method(
      'getAction',
      [param('request', 'JsonRequest', ['Request']), param('id', 'string'), param('page', 'number')],
      { paramBindings: [{ kind: 'QueryParam', parameter: 'page', key: null }] },
    );
    makeDeriver().read(collection, m, ['post'], config);

    expect(collection.get('get_post')?.path).toBe('post/{id}');
  });

  it('appends member custom verbs and dispatches them as PATCH', () => {
    const collection = new RestRouteCollection();
    makeDeriver().read(collection, method('lockAction', [param('id')]), ['post'], config);

    const route = collection.get('lock_post');
    expect(route?.path).toBe('post/{id}/lock');
    expect(route?.methods).toEqual(['PATCH']);
  });

  it('dispatches collection custom verbs as GET on the plural', () => {
    const collection = new RestRouteCollection();
    makeDeriver().read(collection, method('publishAction'), ['post'], config);

    const route = collection.get('publish_post');
    expect(route?.path).toBe('posts/publish');
    expect(route?.methods).toEqual(['GET']);
  });

  it('uses the anonymous root when there are no resources', () => {
    const collection = new RestRouteCollection();
    makeDeriver().read(collection, method('getAction', [param('id')]), [], config);

    expect(collection.get('get')?.path).toBe('{id}');
  });

  it('applies route and name prefixes', () => {
    const collection = new RestRouteCollection();
    const prefixed = createDeriverConfig({ routePrefix: 'api', namePrefix: 'api_' });
    makeDeriver().read(collection, method('getAction', [param('id')]), ['post'], prefixed);

    expect(collection.names()).toEqual(['api_get_post']);
    expect(collection.get('api_get_post')?.path).toBe('api/post/{id}');
  });

  it('keeps collections singular when pluralization is disabled', () => {
    const collection = new RestRouteCollection();
    const singular = createDeriverConfig({ pluralize: false });
    const names = makeDeriver().read(collection, method('cgetAction'), ['post'], singular);

    expect(names).toEqual(['cget_post', 'get_post']);
    expect(collection.get('cget_post')?.path).toBe('post');
  });

  it('adds the format suffix and requirement', () => {
    const collection = new RestRouteCollection();
    const withFormat = createDeriverConfig({
      includeFormat: true,
      formats: { json: 'application/json', xml: 'text/xml' },
    });
    makeDeriver().read(collection, method('getAction', [param('id')]), ['post'], withFormat);

    const route = collection.get('get_post');
    expect(route?.path).toBe('post/{id}.{_format}');
    expect(route?.requirements).toEqual({ _format: 'json|xml' });
  });

  it('leaves convention routes without a condition when a version is set', () => {
    const collection = new RestRouteCollection();
    makeDeriver().read(collection, method('getAction'), ['post'], createDeriverConfig({ version: 'v2' }));

    expect(collection.get('get_post')?.condition).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Singular names
// ---------------------------------------------------------------------------

describe('ActionRouteDeriver: singular name', () => {
  it('records the resource of a one-argument member action', () => {
    const collection = new RestRouteCollection();
    makeDeriver().read(collection, method('getAction', [param('id')]), ['post'], config);

    expect(collection.getSingularName()).toBe('post');
  });

  it('does not record it for collection routes without arguments', () => {
    const collection = new RestRouteCollection();
    makeDeriver().read(collection, method('cgetAction'), ['post'], config);

    expect(collection.getSingularName()).toBeNull();
  });

  it('discounts parent arguments', () => {
    const collection = new RestRouteCollection();
    const parentConfig = createDeriverConfig({ parents: ['post'] });
    makeDeriver().read(collection, method('getAction', [param('slug'), param('id')]), ['comment'], parentConfig);

    expect(collection.getSingularName()).toBe('comment');
    expect(collection.get('get_post_comment')?.path).toBe('post/{slug}/comment/{id}');
  });
});

// ---------------------------------------------------------------------------
// Non-inflectable collections
// ---------------------------------------------------------------------------

describe('ActionRouteDeriver: non-inflectable collections', () => {
  it('registers the collection alias and the plain name', () => {
    const collection = new RestRouteCollection();
    const names = makeDeriver().read(collection, method('cgetAction'), ['sheep'], config);

    expect(names).toEqual(['cget_sheep', 'get_sheep']);
    expect(collection.get('get_sheep')).toEqual(collection.get('cget_sheep'));
    expect(collection.get('get_sheep')).not.toBe(collection.get('cget_sheep'));
  });

  it('skips the plain name when a member route holds it', () => {
    const logger = new BufferedLogger('warn');
    const collection = new RestRouteCollection();
    const deriver = makeDeriver({}, logger);

    deriver.read(collection, method('getAction', [param('id')]), ['sheep'], config);
    const names = deriver.read(collection, method('cgetAction'), ['sheep'], config);

    expect(names).toEqual(['cget_sheep']);
    expect(collection.get('get_sheep')?.path).toBe('sheep/{id}');
    expect(logger.lines).toHaveLength(1);
    expect(logger.lines[0]).toContain('Collection alias skipped: name held by a different route');
  });

  it('fails when a member route follows the plain alias', () => {
    const collection = new RestRouteCollection();
    const deriver = makeDeriver();

    deriver.read(collection, method('cgetAction'), ['sheep'], config);
    expect(() => deriver.read(collection, method('getAction', [param('id')]), ['sheep'], config)).toThrow(
      DuplicateRouteError,
    );
  });
});

// ---------------------------------------------------------------------------
// Annotations
// ---------------------------------------------------------------------------

describe('ActionRouteDeriver: annotations', () => {
  it('replaces the path and keeps the convention name', () => {
    const collection = new RestRouteCollection();
    const m = method('getAction', [param('slug')], {
      annotations: [annotation('Get', { path: '/articles/{slug}', requirements: { slug: '[a-z-]+' } })],
    });
    makeDeriver().read(collection, m, ['post'], createDeriverConfig({ routePrefix: 'api' }));

    const route = collection.get('get_post');
    expect(route?.path).toBe('api/articles/{slug}');
    expect(route?.requirements).toEqual({ slug: '[a-z-]+' });
    expect(route?.methods).toEqual(['GET']);
  });

  it('takes methods from the generic route annotation', () => {
    const collection = new RestRouteCollection();
    const m = method('updateAction', [param('id')], {
      annotations: [annotation('Route', { methods: ['put', 'patch'] })],
    });
    makeDeriver().read(collection, m, ['post'], config);

    const route = collection.get('update_post');
    expect(route?.path).toBe('post/{id}/update');
    expect(route?.methods).toEqual(['PUT', 'PATCH']);
  });

  it('falls back to the convention verb for a generic route without methods', () => {
    const collection = new RestRouteCollection();
    const m = method('deleteAction', [param('id')], { annotations: [annotation('Route')] });
    makeDeriver().read(collection, m, ['post'], config);

    expect(collection.get('delete_post')?.methods).toEqual(['DELETE']);
  });

  it('derives one route per annotation, in tag order', () => {
    const collection = new RestRouteCollection();
    const m = method('getAction', [param('id')], {
      annotations: [
        annotation('Post', { name: '_create' }),
        annotation('Get', { name: '_show' }),
      ],
    });
    const names = makeDeriver().read(collection, m, ['post'], config);

    expect(names).toEqual(['get_post_show', 'get_post_create']);
    expect(collection.get('get_post_create')?.methods).toEqual(['POST']);
  });

  it('replaces the name when method prefixing is disabled', () => {
    const collection = new RestRouteCollection();
    const m = method('getAction', [param('id')], {
      annotations: [annotation('Get', { name: 'post_show', options: { method_prefix: false } })],
    });
    const names = makeDeriver().read(collection, m, ['post'], createDeriverConfig({ namePrefix: 'api_' }));

    expect(names).toEqual(['api_post_show']);
    expect(collection.get('api_post_show')?.options).toEqual({ method_prefix: false });
  });

  it('merges annotation defaults over the controller default', () => {
    const collection = new RestRouteCollection();
    const m = method('getAction', [], {
      annotations: [annotation('Get', { defaults: { page: 1, _controller: 'Override::get' } })],
    });
    makeDeriver().read(collection, m, ['post'], config);

    expect(collection.get('get_post')?.defaults).toEqual({ _controller: 'Override::get', page: 1 });
  });

  it('copies host and schemes from the annotation', () => {
    const collection = new RestRouteCollection();
    const m = method('getAction', [], {
      annotations: [annotation('Get', { host: '{tenant}.example.test', schemes: ['https'] })],
    });
    makeDeriver().read(collection, m, ['post'], config);

    const route = collection.get('get_post');
    expect(route?.host).toBe('{tenant}.example.test');
    expect(route?.schemes).toEqual(['https']);
  });

  it('ANDs the annotation condition with the configured version', () => {
    const collection = new RestRouteCollection();
    const m = method('getAction', [], {
      annotations: [annotation('Get', { condition: "request.headers.get('X') == 'y'" })],
    });
    makeDeriver().read(collection, m, ['post'], createDeriverConfig({ version: 'v2' }));

    expect(collection.get('get_post')?.condition).toBe(
      "(request.headers.get('X') == 'y') and request.attributes.get('version') == 'v2'",
    );
  });

  it('keeps an explicit format requirement', () => {
    const collection = new RestRouteCollection();
    const m = method('getAction', [], {
      annotations: [annotation('Get', { requirements: { _format: 'json' } })],
    });
    const withFormat = createDeriverConfig({ includeFormat: true, formats: { json: 'a', xml: 'b' } });
    makeDeriver().read(collection, m, ['post'], withFormat);

    expect(collection.get('get_post')?.requirements).toEqual({ _format: 'json' });
  });
});

// ---------------------------------------------------------------------------
// Eligibility and errors
// ---------------------------------------------------------------------------

describe('ActionRouteDeriver: eligibility', () => {
  it('ignores names that are not actions', () => {
    const collection = new RestRouteCollection();
    expect(makeDeriver().read(collection, method('render'), ['post'], config)).toEqual([]);
    expect(collection.size).toBe(0);
  });

  it('ignores internal names even when annotated', () => {
    const collection = new RestRouteCollection();
    const m = method('_getAction', [], { annotations: [annotation('Get')] });
    expect(makeDeriver().read(collection, m, ['post'], config)).toEqual([]);
  });

  it('ignores methods marked NoRoute', () => {
    const collection = new RestRouteCollection();
    const m = method('getAction', [], { annotations: [annotation('NoRoute'), annotation('Get')] });
    expect(makeDeriver().read(collection, m, ['post'], config)).toEqual([]);
  });

  it('ignores convention methods of a NoRoute class', () => {
    const collection = new RestRouteCollection();
    const deriver = makeDeriver({ PostController: [annotation('NoRoute')] });
    expect(deriver.read(collection, method('getAction'), ['post'], config)).toEqual([]);
  });

  it('keeps explicitly routed methods of a NoRoute class', () => {
    const collection = new RestRouteCollection();
    const deriver = makeDeriver({ PostController: [annotation('NoRoute')] });
    const m = method('getAction', [], { annotations: [annotation('Get')] });
    expect(deriver.read(collection, m, ['post'], config)).toEqual(['get_post']);
  });

  it('resolves the class NoRoute against the declaring type', () => {
    const collection = new RestRouteCollection();
    const deriver = makeDeriver({ BaseController: [annotation('NoRoute')], PostController: [] });
    const inherited = method('optionsAction', [], { declaringType: 'BaseController' });

    expect(deriver.read(collection, inherited, ['post'], config)).toEqual([]);
    expect(deriver.read(collection, method('getAction'), ['post'], config)).toEqual(['get_post']);
  });
});

describe('ActionRouteDeriver: configuration', () => {
  it.each([[''], ['post/']])('rejects the parent %j', (parent) => {
    const collection = new RestRouteCollection();
    const bad = createDeriverConfig({ parents: [parent] });
    expect(() => makeDeriver().read(collection, method('getAction'), ['comment'], bad)).toThrow(
      ConfigurationError,
    );
  });

  it('rejects invalid parents before checking eligibility', () => {
    const collection = new RestRouteCollection();
    const bad = createDeriverConfig({ parents: ['post/'] });
    expect(() => makeDeriver().read(collection, method('_internal'), [], bad)).toThrow(ConfigurationError);
  });

  it('produces identical routes on repeated runs', () => {
    const run = (): string => {
      const collection = new RestRouteCollection();
      const deriver = makeDeriver();
      const cfg = createDeriverConfig({ parents: ['blog'], version: '1', includeFormat: true });
      deriver.read(collection, method('getCommentAction', [param('blog'), param('id')]), [], cfg);
      deriver.read(collection, method('cgetAction', [param('blog')]), ['comment'], cfg);
      return JSON.stringify(collection.routes());
    };
    expect(run()).toBe(run());
  });
});
