import path from 'node:path';
import type { VectorStorePort } from '../domain/ports/VectorStorePort.js';
import type { DocumentStructure, FileType } from '../domain/entities/Document.js';
import { DocumentNotFoundError } from '../domain/errors/DomainErrors.js';
import { truncate } from '../shared/TextUtils.js';

export interface DocumentEntry {
  documentId: string;
  sourcePath: string;
  fileType: FileType;
  topics: string[];
}

export interface DocumentSummary extends DocumentEntry {
  summaryText: string;
  structure: DocumentStructure;
  chunkCount: number;
  indexedAt: number;
}

export interface CollectionAnalysis {
  totalDocuments: number;
  totalChunks: number;
  typesBreakdown: Partial<Record<FileType, number>>;
  documents: Array<{
    documentId: string;
    name: string;
    fileType: FileType;
    chunkCount: number;
    topics: string[];
    summary: string;
  }>;
}

/** 文件集合的唯讀檢視 */
export class CollectionUseCase {
  constructor(private readonly store: VectorStorePort) {}

  listDocuments(): DocumentEntry[] {
    return this.store.listDocuments().map((d) => ({
      documentId: d.documentId,
      sourcePath: d.sourcePath,
      fileType: d.fileType,
      topics: d.topics,
    }));
  }

  /**
   * 依序以文件 id、來源路徑、檔名查詢
   * @throws DocumentNotFoundError
   */
  getDocumentSummary(idOrName: string): DocumentSummary {
    const documentId = this.store.getDocument(idOrName)
      ? idOrName
      : this.store.getDocumentBySource(path.resolve(idOrName))?.documentId
        ?? this.store.listDocuments().find((d) => path.basename(d.sourcePath) === idOrName)?.documentId;
    const doc = documentId ? this.store.getDocument(documentId) : undefined;
    if (!doc) throw new DocumentNotFoundError(idOrName);

    return {
      documentId: doc.documentId,
      sourcePath: doc.sourcePath,
      fileType: doc.fileType,
      topics: doc.topics,
      summaryText: doc.summaryText,
      structure: doc.structure,
      chunkCount: doc.chunkIds.length,
      indexedAt: doc.indexedAt,
    };
  }

  analyzeCollection(): CollectionAnalysis {
    const stats = this.store.stats();
    const documents = this.store.listDocuments().map((listing) => {
      const doc = this.store.getDocument(listing.documentId);
      return {
        documentId: listing.documentId,
        name: path.basename(listing.sourcePath),
        fileType: listing.fileType,
        chunkCount: listing.chunkCount,
        topics: listing.topics.slice(0, 10),
        summary: truncate(doc?.summaryText ?? '', 200),
      };
    });

    return {
      totalDocuments: stats.totalDocuments,
      totalChunks: stats.totalChunks,
      typesBreakdown: stats.typesBreakdown,
      documents,
    };
  }
}
