import {DEFAULT_CONVERTER, resolveConverter, type PathConverter, type RouteParamValue} from './converters';
import {err, ok, RoutePatternError, type RoutePatternResult} from './errors';

export type RouteParams = Record<string, RouteParamValue>;

/**
 * Outcome of matching a path against the start of a pattern. `remainder` is the
 * part of the path that followed the matched segment.
 */
export type RouteMatch = {
  remainder: string;
  params: RouteParams;
};

export type RoutePattern = {
  readonly template: string;
  readonly parameterNames: readonly string[];
  match: (path: string) => RouteMatch | null;
  toString: () => string;
};

type CompiledParameter = {
  name: string;
  converter: PathConverter;
};

const PARAMETER_COMPONENT_REGEX = /<(?:([^>:]+):)?([^>]+)>/gu;
const PARAMETER_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/u;
const REGEX_SYNTAX_CHARACTERS = /[.*+?^${}()|[\]\\/]/gu;

const escapeLiteral = (value: string) => value.replace(REGEX_SYNTAX_CHARACTERS, '\\$&');

const checkLiteral = (literal: string, template: string): RoutePatternResult<string> => {
  if (literal.includes('<') || literal.includes('>')) {
    return err('pattern_bracket_unbalanced', `Route template has unbalanced angle brackets: ${template}`);
  }

  return ok(escapeLiteral(literal));
};

/**
 * Compiles a route template such as `blog/<int:year>/<str:slug>/` into a pattern
 * matching the start of a path (the leading slash already stripped).
 */
export const compileRoutePattern = (template: string): RoutePatternResult<RoutePattern> => {
  if (template.startsWith('/')) {
    return err('pattern_leading_slash', `Route template must not start with a slash: ${template}`);
  }

  const parameters: CompiledParameter[] = [];
  let source = '';
  let cursor = 0;

  for (const component of template.matchAll(PARAMETER_COMPONENT_REGEX)) {
    const componentStart = component.index ?? cursor;
    const literal = checkLiteral(template.slice(cursor, componentStart), template);
    if (!literal.ok) {
      return literal;
    }
    source += literal.value;

    const converterName = component[1] ?? DEFAULT_CONVERTER;
    const parameterName = component[2] ?? '';
    if (!PARAMETER_NAME_REGEX.test(parameterName)) {
      return err('pattern_parameter_invalid', `Route parameter name "${parameterName}" is not a valid identifier`);
    }

    if (parameters.some(parameter => parameter.name === parameterName)) {
      return err('pattern_parameter_duplicate', `Route parameter "${parameterName}" appears more than once`);
    }

    const converter = resolveConverter(converterName);
    if (!converter) {
      return err('pattern_converter_unknown', `Route parameter "${parameterName}" uses unknown converter "${converterName}"`);
    }

    parameters.push({name: parameterName, converter});
    source += `(${converter.regex})`;
    cursor = componentStart + component[0].length;
  }

  const trailing = checkLiteral(template.slice(cursor), template);
  if (!trailing.ok) {
    return trailing;
  }
  source += trailing.value;

  const regex = new RegExp(`^${source}`, 'u');

  const match = (path: string): RouteMatch | null => {
    const result = regex.exec(path);
    if (!result) {
      return null;
    }

    const params: RouteParams = {};
    for (const [index, parameter] of parameters.entries()) {
      const value = parameter.converter.toValue(result[index + 1] ?? '');
      if (value === null) {
        return null;
      }
      params[parameter.name] = value;
    }

    return {remainder: path.slice(result[0].length), params};
  };

  return ok({
    template,
    parameterNames: parameters.map(parameter => parameter.name),
    match,
    toString: () => template
  });
};

/**
 * Throwing variant for route declarations evaluated at startup.
 */
export const routePattern = (template: string): RoutePattern => {
  const compiled = compileRoutePattern(template);
  if (!compiled.ok) {
    throw new RoutePatternError(compiled.error.code, compiled.error.message);
  }

  return compiled.value;
};

/**
 * Literal text before the first dynamic segment of a canonical pattern string.
 */
export const staticPrefixOf = (template: string) => {
  const dynamicIndex = template.indexOf('<');
  return dynamicIndex === -1 ? template : template.slice(0, dynamicIndex);
};
