/**
 * action-name-parser.ts
 * Reads an HTTP verb and resource fragments out of an action method name.
 *
 *   getCommentsAction → verb "get", fragments ["Comments"]
 *   cgetAction        → verb "cget", fragments []
 *   lockUserApiAction → verb "lock", fragments ["User", "Api"]
 *
 * A hand-written lexer: a leading lowercase run, PascalCase fragments, and
 * the literal "Action" suffix. Anything else is not an action.
 */

import type { ParsedAction } from '../models/routes.js';
import { COLLECTION_ROUTE_PREFIX, isHttpMethod } from './route-utils.js';

const ACTION_SUFFIX = 'Action';

export interface ActionNameTokens {
  /** Lowercased verb token. */
  verb: string;
  /** PascalCase fragments, each keeping its leading capital. */
  fragments: string[];
}

// ---------------------------------------------------------------------------
// Lexer
// ---------------------------------------------------------------------------

function isLower(ch: string): boolean {
  return ch >= 'a' && ch <= 'z';
}

function isUpper(ch: string): boolean {
  return ch >= 'A' && ch <= 'Z';
}

function isVerbChar(ch: string): boolean {
  return isLower(ch) || (ch >= '0' && ch <= '9') || ch === '_';
}

/**
 * Split at uppercase letters: "UserApiKey" → ["User", "Api", "Key"].
 * Consecutive capitals each start a fragment: "API" → ["A", "P", "I"].
 */
export function splitPascalCase(input: string): string[] {
  const fragments: string[] = [];
  let current = '';
  for (const ch of input) {
    if (isUpper(ch) && current !== '') {
      fragments.push(current);
      current = ch;
    } else {
      current += ch;
    }
  }
  if (current !== '') fragments.push(current);
  return fragments;
}

/**
 * Tokenize an action method name. Returns null when the name is not
 * `<verb><Fragment>*Action` with a verb of at least two characters.
 */
export function tokenizeActionName(identifier: string): ActionNameTokens | null {
  if (!identifier.endsWith(ACTION_SUFFIX)) return null;
  const body = identifier.slice(0, -ACTION_SUFFIX.length);

  if (!isLower(body.charAt(0))) return null;
  let end = 1;
  while (end < body.length && isVerbChar(body.charAt(end))) end++;
  if (end < 2) return null;

  const rest = body.slice(end);
  if (rest !== '' && !isUpper(rest.charAt(0))) return null;

  return { verb: body.slice(0, end).toLowerCase(), fragments: splitPascalCase(rest) };
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse an action name against a seed resource list.
 *
 * Collection actions (`c` + HTTP verb, or bare `options`) pluralize the last
 * seed resource; `isInflectable` records whether that changed its spelling.
 * The seed array is not modified.
 *
 * @param pluralize - Resource pluralization honoring the scan's override.
 */
export function parseAction(
  identifier: string,
  seed: readonly string[],
  pluralize: (resource: string) => string,
): ParsedAction | null {
  const tokens = tokenizeActionName(identifier);
  if (tokens === null) return null;

  let httpMethod = tokens.verb;
  let isCollection = false;
  let isInflectable = true;

  if (
    httpMethod.startsWith(COLLECTION_ROUTE_PREFIX) &&
    isHttpMethod(httpMethod.slice(COLLECTION_ROUTE_PREFIX.length))
  ) {
    isCollection = true;
    httpMethod = httpMethod.slice(COLLECTION_ROUTE_PREFIX.length);
  } else if (httpMethod === 'options') {
    isCollection = true;
  }

  const resources: Array<string | null> = [...seed];
  const last = seed.at(-1);
  if (isCollection && last !== undefined) {
    const pluralized = pluralize(last);
    isInflectable = pluralized !== last;
    resources[resources.length - 1] = pluralized;
  }

  resources.push(...tokens.fragments);

  return { httpMethod, resources, isCollection, isInflectable };
}
