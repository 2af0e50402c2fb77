/**
 * resource-merger.test.ts
 * Unit tests for injected-type exclusion and parent merging.
 */

import { BindingParamReader } from '../../services/param-reader.js';
import {
  createInjectedTypePredicate,
  mergeResources,
  selectRoutableArguments,
} from '../resource-merger.js';
import { method, param } from './helpers.js';

describe('createInjectedTypePredicate', () => {
  it('matches the default types by name and by ancestor', () => {
    const isInjected = createInjectedTypePredicate();
    expect(isInjected(param('request', 'Request'))).toBe(true);
    expect(isInjected(param('request', 'JsonRequest', ['Request']))).toBe(true);
    expect(isInjected(param('id', 'string'))).toBe(false);
    expect(isInjected(param('id'))).toBe(false);
  });

  it('excludes a caller-supplied type outside the defaults', () => {
    const isInjected = createInjectedTypePredicate(['CurrentUser']);
    expect(isInjected(param('user', 'CurrentUser'))).toBe(true);
    expect(isInjected(param('admin', 'AdminUser', ['CurrentUser']))).toBe(true);
  });

  it('treats default types as routable once a custom list replaces them', () => {
    const isInjected = createInjectedTypePredicate(['CurrentUser']);
    expect(isInjected(param('request', 'Request'))).toBe(false);
    expect(isInjected(param('fetcher', 'ParamFetcher'))).toBe(false);
  });
});

describe('selectRoutableArguments', () => {
  it('drops bound and injected parameters, keeping declaration order', () => {
    const m = method(
      'getAction',
      [param('user', 'CurrentUser'), param('id', 'string'), param('request', 'Request'), param('page', 'number')],
      { paramBindings: [{ kind: 'QueryParam', parameter: 'page', key: null }] },
    );
    const routable = selectRoutableArguments(
      m,
      new BindingParamReader(),
      createInjectedTypePredicate(['CurrentUser']),
    );
    expect(routable.map((p) => p.name)).toEqual(['id', 'request']);
  });
});

describe('mergeResources', () => {
  it('prepends parents', () => {
    expect(mergeResources(['comment'], ['post'])).toEqual(['post', 'comment']);
  });

  it('yields the anonymous root for an empty chain', () => {
    expect(mergeResources([], [])).toEqual([null]);
  });
});
