// Insomnia template variables: {{ _.name }} where name can contain word chars, $, ., -

/** Regex source for matching variable names after the `_.` prefix */
export const VAR_NAME_CHARS = '[\\w.$-]+';

/** Full pattern for matching {{ _.variable }} placeholders (use with 'g' flag) */
export const VAR_PATTERN_SOURCE = '\\{\\{\\s*_\\.(' + VAR_NAME_CHARS + ')\\s*\\}\\}';

export function varPatternGlobal(): RegExp {
  return new RegExp(VAR_PATTERN_SOURCE, 'g');
}

/** Render a reference to an environment variable. */
export function templateVar(name: string): string {
  return `{{ _.${name} }}`;
}

export const BASE_URL_VAR = 'base_url';
export const API_KEY_VAR = 'api_key';
