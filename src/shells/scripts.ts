/**
 * Activation script templates
 *
 * Templates live in the package's templates/ directory, one per shell
 * family, and are read on demand.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { TEMPLATE_PLACEHOLDERS } from '../config/constants.js';

export type TemplateName = 'bash.sh' | 'zsh.zsh' | 'fish.fish';

export interface ScriptVariables {
  completeFunc: string;
  scriptNames: string;
  completeVar: string;
}

const templateCache = new Map<TemplateName, string>();

/**
 * Read a template from the templates/ directory
 */
export function loadTemplate(name: TemplateName): string {
  const cached = templateCache.get(name);
  if (cached !== undefined) {
    return cached;
  }

  // Resolves to <package>/templates from both src/shells and dist/shells
  const path = fileURLToPath(new URL(`../../templates/${name}`, import.meta.url));
  const template = readFileSync(path, 'utf8');
  templateCache.set(name, template);
  return template;
}

/**
 * Name of the shell function defined by a script: dashes become
 * underscores and any other non-identifier character is dropped
 */
export function completionFunctionName(progName: string): string {
  const ident = progName.replace(/-/g, '_').replace(/[^a-zA-Z0-9_]/g, '');
  return `_${ident}_completion`;
}

/**
 * Substitute the placeholders, trim, and terminate the script with ";"
 */
export function fillTemplate(template: string, variables: ScriptVariables): string {
  const filled = template
    .replaceAll(TEMPLATE_PLACEHOLDERS.COMPLETE_FUNC, variables.completeFunc)
    .replaceAll(TEMPLATE_PLACEHOLDERS.SCRIPT_NAMES, variables.scriptNames)
    .replaceAll(TEMPLATE_PLACEHOLDERS.COMPLETE_VAR, variables.completeVar);

  return `${filled.trim()};`;
}
