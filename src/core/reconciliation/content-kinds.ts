/**
 * Content kinds for the three wholesale resources
 */

import { EditFailureError, ErrorCode } from "../errors.js";
import { TaxonomyResponseSchema, TaxonomyTreeSchema, formatIssues } from "../../utils/validation.js";
import type { ContentKind } from "./interfaces/IReconciliation.js";
import type { RecordType, TaxonomyTree } from "../../types/index.js";

/**
 * One record body, edited as markdown and replaced as `{type, content}`
 */
export function singleRecordKind(type: RecordType): ContentKind<string> {
  return {
    name: "single-record",
    extension: ".md",
    serialize: (body) => body,
    deserialize: (text) => text,
    wrap: (content) => ({ type, content }),
  };
}

/**
 * The whole transaction ledger, edited as CSV and replaced as `{content}`
 */
export const ledgerKind: ContentKind<string> = {
  name: "ledger",
  extension: ".csv",
  serialize: (body) => body,
  deserialize: (text) => text,
  wrap: (content) => ({ content }),
};

/**
 * The whole category tree. The listing arrives as `{categories: {...}}`, is
 * edited as pretty-printed JSON of the tree alone, and goes back as
 * `{content}` holding the re-serialized tree.
 */
export const taxonomyTreeKind: ContentKind<TaxonomyTree> = {
  name: "taxonomy-tree",
  extension: ".json",

  serialize(body) {
    const parsed = TaxonomyResponseSchema.safeParse(parseJson(body, "Category listing"));
    if (!parsed.success) {
      throw new EditFailureError(
        `Unexpected category listing: ${formatIssues(parsed.error).join("; ")}`,
        ErrorCode.EDIT_INVALID_CONTENT
      );
    }
    return JSON.stringify(parsed.data.categories, null, 2);
  },

  deserialize(text) {
    const parsed = TaxonomyTreeSchema.safeParse(parseJson(text, "Edited category tree"));
    if (!parsed.success) {
      throw new EditFailureError(
        `Edited category tree is invalid: ${formatIssues(parsed.error).join("; ")}`,
        ErrorCode.EDIT_INVALID_CONTENT
      );
    }
    return parsed.data;
  },

  wrap: (tree) => ({ content: JSON.stringify(tree) }),
};

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    throw new EditFailureError(
      `${what} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.EDIT_INVALID_CONTENT
    );
  }
}
