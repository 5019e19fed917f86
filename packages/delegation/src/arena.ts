import type { IncludeSpec } from "@routegraph/types";

/** What the resolver needs to know about a proxy document. */
export type DelegationDocument = {
  readonly key: string;
  readonly namespace: string;
  readonly name: string;
  readonly root: boolean;
  readonly includes: readonly IncludeSpec[];
};

/**
 * Flat store of proxy documents addressed by index. Inclusion edges are
 * resolved by key lookup; documents never point at each other.
 */
export type DocumentArena = {
  readonly documents: readonly DelegationDocument[];
  indexOf(namespace: string, name: string): number | undefined;
  at(index: number): DelegationDocument;
  label(index: number): string;
};

export const createDocumentArena = (
  documents: readonly DelegationDocument[]
): DocumentArena => {
  const positions = new Map<string, number>();
  for (const [index, document] of documents.entries()) {
    positions.set(`${document.namespace}/${document.name}`, index);
  }

  const at = (index: number): DelegationDocument => {
    const document = documents[index];
    if (!document) {
      throw new RangeError(`No document at arena index ${index}`);
    }
    return document;
  };

  return {
    documents,
    indexOf: (namespace, name) => positions.get(`${namespace}/${name}`),
    at,
    label: (index) => {
      const document = at(index);
      return `${document.namespace}/${document.name}`;
    },
  };
};
