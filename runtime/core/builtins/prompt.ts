// runtime/core/builtins/prompt.ts

import type { Value, ValueObject } from '../../../core/types.ts';
import type { ExpressionScope } from '../expressionEngine.ts';
import { ToolResolutionError, MissingArgumentError } from '../errors.ts';
import type { BuiltinTool } from '../toolsRuntime.ts';
import { getPath } from '../value.ts';
import { renderTemplate } from '../variables.ts';
import { optionalString } from './args.ts';

const PROMPT_ARGS = new Set(['slug', 'file', 'template']);

/**
 * Scope where the call's own arguments shadow the context.
 */
export function layeredScope(locals: ValueObject, base: ExpressionScope): ExpressionScope {
  return {
    lookup(parts: readonly string[]): Value | undefined {
      const [root, ...rest] = parts;
      if (root !== undefined && Object.prototype.hasOwnProperty.call(locals, root)) {
        return getPath(locals[root], rest);
      }
      return base.lookup(parts);
    },
  };
}

/**
 * `p(slug=..., name=...)`: render a prompt template. Extra arguments are visible
 * to the template as top-level names.
 */
export const prompt: BuiltinTool = {
  name: 'p',
  async execute({ tool, args, context, services }) {
    const inline = optionalString(args, 'template');
    let template: string;
    if (inline !== undefined) {
      template = inline;
    } else {
      const slug = optionalString(args, 'slug') ?? optionalString(args, 'file');
      if (slug === undefined) throw new MissingArgumentError(tool, 'slug');
      const resource = services.resources.getPrompt(slug);
      if (!resource) throw new ToolResolutionError(`Prompt '${slug}' not found`, { slug });
      template = resource.content;
    }

    const locals: ValueObject = {};
    for (const [key, value] of Object.entries(args)) {
      if (!PROMPT_ARGS.has(key)) locals[key] = value;
    }
    return renderTemplate(template, layeredScope(locals, context));
  },
};
