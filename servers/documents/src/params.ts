/**
 * Schema pieces shared by the document tools.
 */

import { Type } from "@sinclair/typebox";

export const FilePath = (description = "Path to the document") => Type.String({ description, minLength: 1 });

export const Password = Type.Optional(
  Type.String({ description: "Document password; a registered password is used when omitted" }),
);

export const IndexName = Type.String({ description: "Index name (letters, digits, '-' and '_')", minLength: 1 });
