/**
 * Documents tool server: extraction, caching, full-text indexes, OCR and
 * passwords for protected files.
 */

import { ToolRegistry, VERSION, errorMessage, type Logger, type ToolServer, type AppConfig } from "../../../src/index.js";
import { createDocumentErrorReporter } from "./errors.js";
import { createDocumentTools } from "./extraction/tools.js";
import { createOcrTools } from "./ocr/tools.js";
import type { CommandRunner } from "./ocr/service.js";
import { createPasswordTools } from "./passwords/tools.js";
import { createSearchTools } from "./search/tools.js";
import { DocumentServerState } from "./state.js";

export { DocumentServerState } from "./state.js";
export { createDocumentErrorReporter, classifyDocumentError, DocumentError } from "./errors.js";

const INSTRUCTIONS = [
  "Tools for reading local documents (txt, md, csv, json, xml, html, pdf, docx, xlsx), full-text indexes, OCR and document passwords.",
  "Register passwords with doc_register_password or doc_auto_detect_passwords before opening protected files.",
  "Create an index with doc_create_index, then query it with doc_search_index.",
].join("\n");

export async function createDocumentsServer(
  config: AppConfig,
  logger: Logger,
  options: { runCommand?: CommandRunner } = {},
): Promise<ToolServer> {
  const log = logger.child("documents");
  const state = new DocumentServerState({ config: config.documents, logger: log, runCommand: options.runCommand });

  try {
    await state.initialize();
  } catch (error) {
    log.warn(`Index directory not ready: ${errorMessage(error)}`);
  }

  const registry = new ToolRegistry().add(
    ...createDocumentTools(state),
    ...createSearchTools(state),
    ...createOcrTools(state),
    ...createPasswordTools(state),
  );
  log.debug(`Registered ${registry.size} document tools`);

  return {
    info: { name: "documents", version: VERSION },
    tools: registry.list(),
    errors: createDocumentErrorReporter(),
    instructions: INSTRUCTIONS,
    async dispose() {
      state.dispose();
    },
  };
}
