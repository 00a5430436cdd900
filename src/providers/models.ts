/**
 * Model discovery. Hosted providers use a fixed catalog; Ollama is asked
 * for the models it has pulled.
 */

import { STATIC_MODELS } from "../types/model.js";
import type { IProviderIdentity } from "../types/model.js";
import { OllamaAdapter } from "./ollama-adapter.js";

export async function listModels(identity: IProviderIdentity): Promise<readonly string[]> {
  if (identity.name === "Ollama") {
    return new OllamaAdapter({ baseUrl: identity.baseUrl }).listModels();
  }
  return STATIC_MODELS[identity.name];
}
