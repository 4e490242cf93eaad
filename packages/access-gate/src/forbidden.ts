import type {AccessDenialReason} from './validator';

export const DEFAULT_DENIAL_MESSAGES: Readonly<Record<AccessDenialReason, string>> = {
  no_token: 'Access denied: No token provided',
  invalid_token: 'Access denied: Invalid token'
};

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;'
};

export const escapeHtml = (value: string) => value.replace(/[&<>"']/gu, character => HTML_ESCAPES[character] ?? character);

const PATH_PLACEHOLDER = /\{\{\s*path\s*\}\}/gu;

/**
 * Fills `{{path}}` in a forbidden-page template with the escaped request path.
 */
export const renderForbiddenTemplate = ({template, path}: {template: string; path: string}) =>
  template.replace(PATH_PLACEHOLDER, () => escapeHtml(path));
