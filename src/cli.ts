#!/usr/bin/env node
import { createAwsServer } from "../servers/aws/src/index.js";
import { createAzureServer } from "../servers/azure/src/index.js";
import { createDocumentsServer } from "../servers/documents/src/index.js";
import { createProgram } from "./cli/program.js";
import { errorMessage } from "./errors/index.js";

const program = createProgram({
  servers: { aws: createAwsServer, azure: createAzureServer, documents: createDocumentsServer },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`cloud-mcp: ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
