/**
 * @hitch/macros - Standard attached macros
 *
 * Importing this module registers the macros with the global registry. Use
 * `registerStandardMacros` to add them to another registry.
 */

import type { MacroDefinition, MacroRegistry } from "@hitch/core";
import { globalRegistry, registerMacros } from "@hitch/core";
import { completionHandlerMacro } from "./completion-handler.js";
import { dictionaryStorageMacro } from "./dictionary-storage.js";
import { equatableMacro } from "./equatable.js";
import { storageMacro } from "./storage.js";

export { completionHandlerMacro } from "./completion-handler.js";
export { dictionaryStorageMacro } from "./dictionary-storage.js";
export { equatableMacro } from "./equatable.js";
export { storageMacro, STORAGE_FIELD } from "./storage.js";
export { MACROS_MODULE } from "./shared.js";

export const standardMacros: readonly MacroDefinition[] = [
  completionHandlerMacro,
  dictionaryStorageMacro,
  storageMacro,
  equatableMacro,
];

export function registerStandardMacros(registry: MacroRegistry = globalRegistry): void {
  registerMacros(registry, ...standardMacros);
}

registerStandardMacros();
