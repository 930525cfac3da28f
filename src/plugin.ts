import type { TermlinkContext } from "./context.ts";

export interface TermlinkPlugin {
  name: string;
  setup: (ctx: TermlinkContext) => void | Promise<void>;
}

export function definePlugin(plugin: TermlinkPlugin): TermlinkPlugin {
  return plugin;
}
