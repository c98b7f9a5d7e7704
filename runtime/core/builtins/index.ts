// runtime/core/builtins/index.ts

import type { BuiltinTool } from '../toolsRuntime.ts';
import { chat } from './chat.ts';
import { DEVTOOLS } from './devtools.ts';
import { fetchTool, fetchUrl } from './http.ts';
import { prompt } from './prompt.ts';
import { notify, returnValue, setContext, timer } from './system.ts';

export function builtinTools(): BuiltinTool[] {
  return [chat, prompt, fetchTool, fetchUrl, timer, notify, setContext, returnValue, ...DEVTOOLS];
}
