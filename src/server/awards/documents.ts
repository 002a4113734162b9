import type { AwardDocument, EvaluateAwardDocument } from "@/server/awards/types";

export function toAwardDocument(document: EvaluateAwardDocument): AwardDocument {
  return {
    id: document.id,
    documentType: document.documentType,
    title: document.title,
    description: document.description,
    relatedLots: Array.from(new Set(document.relatedLots ?? [])),
  };
}

/**
 * Union of lots referenced by request documents. Empty when no document
 * names a lot.
 */
export function collectDocumentLots(
  documents: readonly EvaluateAwardDocument[],
): Set<string> {
  const lots = new Set<string>();
  for (const document of documents) {
    for (const lotId of document.relatedLots ?? []) {
      lots.add(lotId);
    }
  }
  return lots;
}

export function documentsCoverLots(
  documents: readonly EvaluateAwardDocument[],
  relatedLots: readonly string[],
): boolean {
  const lots = collectDocumentLots(documents);
  if (lots.size === 0) {
    return true;
  }
  return relatedLots.every((lotId) => lots.has(lotId));
}

/**
 * Id-keyed merge of request documents into the stored ones.
 *
 * Request ids come first in request order, followed by stored ids the
 * request did not mention, in stored order. A document present on both
 * sides keeps its stored id and relatedLots and takes title, description
 * and documentType from the request. A repeated id inside the request
 * resolves to its last occurrence.
 */
export function mergeAwardDocuments(
  stored: readonly AwardDocument[],
  requested: readonly EvaluateAwardDocument[],
): AwardDocument[] {
  const requestedById = new Map<string, EvaluateAwardDocument>();
  for (const document of requested) {
    requestedById.set(document.id, document);
  }
  if (requestedById.size === 0) {
    return [...stored];
  }

  const storedById = new Map<string, AwardDocument>();
  for (const document of stored) {
    storedById.set(document.id, document);
  }
  if (storedById.size === 0) {
    return Array.from(requestedById.values(), toAwardDocument);
  }

  const merged = new Map<string, AwardDocument>();
  for (const [id, update] of requestedById) {
    const existing = storedById.get(id);
    merged.set(
      id,
      existing
        ? {
            ...existing,
            title: update.title,
            description: update.description,
            documentType: update.documentType,
          }
        : toAwardDocument(update),
    );
  }
  for (const [id, existing] of storedById) {
    if (!merged.has(id)) {
      merged.set(id, existing);
    }
  }
  return Array.from(merged.values());
}
