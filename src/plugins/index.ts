/**
 * Predicast – Plugin index
 *
 * Central export for the built-in plugins, plus a small plugin type and
 * helpers for composing them.
 *
 *   import { createEngine } from '../core/engine';
 *   import { textPlugin, applyPlugins } from '../plugins';
 *
 *   const engine = applyPlugins(
 *     createEngine(),
 *     textPlugin,
 *     (eng) => eng.withMethod(myMethod),
 *   );
 *
 * License: Apache-2.0
 */

import type { Engine } from '../core/engine';

export { textPlugin, textMethods } from './text';
export type { TextPluginOptions } from './text';

/////////////////////////////
// Plugin composition types
/////////////////////////////

/**
 * A function that takes an engine and returns a new one, usually with extra
 * methods registered.
 */
export type Plugin = (engine: Engine) => Engine;

/**
 * A plugin that accepts configuration first.
 *
 *   const prefixedText: ConfigurablePlugin<TextPluginOptions> =
 *     (options) => (engine) => textPlugin(engine, options);
 */
export type ConfigurablePlugin<Options = unknown> = (options: Options) => Plugin;

/**
 * Apply plugins left to right: engine' = pN(...(p2(p1(engine)))).
 */
export function applyPlugins(engine: Engine, ...plugins: Plugin[]): Engine {
  return plugins.reduce((eng, plugin) => plugin(eng), engine);
}

/**
 * A named, reusable group of plugins.
 */
export interface PluginSet {
  /** For debugging and logs. */
  readonly name: string;
  readonly plugins: readonly Plugin[];

  /** Same as `applyPlugins(engine, ...plugins)`. */
  attach(engine: Engine): Engine;
}

export function createPluginSet(name: string, ...plugins: Plugin[]): PluginSet {
  const frozen: readonly Plugin[] = Object.freeze([...plugins]);

  return {
    name,
    plugins: frozen,
    attach(engine: Engine): Engine {
      return applyPlugins(engine, ...frozen);
    },
  };
}
