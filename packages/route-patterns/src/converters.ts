export type RouteParamValue = string | number;

export type PathConverter = {
  regex: string;
  toValue: (raw: string) => RouteParamValue | null;
};

const identity = (raw: string) => raw;

const toSafeInteger = (raw: string) => {
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) ? value : null;
};

export const PATH_CONVERTERS: Readonly<Record<string, PathConverter>> = {
  str: {regex: '[^/]+', toValue: identity},
  int: {regex: '[0-9]+', toValue: toSafeInteger},
  slug: {regex: '[-a-zA-Z0-9_]+', toValue: identity},
  uuid: {regex: '[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}', toValue: identity},
  path: {regex: '.+', toValue: identity}
};

export const DEFAULT_CONVERTER = 'str';

export const resolveConverter = (name: string): PathConverter | null =>
  Object.prototype.hasOwnProperty.call(PATH_CONVERTERS, name) ? (PATH_CONVERTERS[name] ?? null) : null;
