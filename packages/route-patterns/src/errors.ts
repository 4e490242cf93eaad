export const routePatternErrorCodes = [
  'pattern_leading_slash',
  'pattern_bracket_unbalanced',
  'pattern_parameter_invalid',
  'pattern_parameter_duplicate',
  'pattern_converter_unknown'
] as const;

export type RoutePatternErrorCode = (typeof routePatternErrorCodes)[number];

export type RoutePatternFailureDetail = {
  code: RoutePatternErrorCode;
  message: string;
};

export type RoutePatternSuccess<T> = {ok: true; value: T};
export type RoutePatternFailure = {ok: false; error: RoutePatternFailureDetail};
export type RoutePatternResult<T> = RoutePatternSuccess<T> | RoutePatternFailure;

export const ok = <T>(value: T): RoutePatternSuccess<T> => ({ok: true, value});

export const err = (code: RoutePatternErrorCode, message: string): RoutePatternFailure => ({
  ok: false,
  error: {code, message}
});

export class RoutePatternError extends Error {
  public readonly code: RoutePatternErrorCode;

  public constructor(code: RoutePatternErrorCode, message: string) {
    super(message);
    this.name = 'RoutePatternError';
    this.code = code;
  }
}
