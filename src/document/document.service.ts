import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import searchConfig from '../config/search.config';
import { FolderIndex, FolderNode, normalizePath, ROOT_PATH } from '../folder/folder-index';
import { FolderSummary, TraversalOrder } from '../folder/interfaces/folder.interface';
import { SearchEngine } from '../search/search-engine';
import {
  CreateDocumentInput,
  OrganizerStats,
  SearchOutcome,
  StoredDocument,
  SuggestOutcome,
  UpdateDocumentInput,
} from './interfaces/document.interface';

function copyDocument(document: StoredDocument): StoredDocument {
  return { ...document, tags: [...document.tags] };
}

/**
 * Owns the canonical document records and the folder tree, and keeps the
 * search engine in step with them.
 */
@Injectable()
export class DocumentService {
  private readonly logger = new Logger(DocumentService.name);
  private readonly documents = new Map<string, StoredDocument>();
  private readonly folders = new FolderIndex();

  constructor(
    private readonly searchEngine: SearchEngine,
    @Inject(searchConfig.KEY)
    private readonly config: ConfigType<typeof searchConfig>,
  ) {}

  createDocument(input: CreateDocumentInput): StoredDocument {
    const id = input.id ?? uuidv4();
    if (this.documents.has(id)) {
      this.logger.warn(`Rejected duplicate document ${id}`);
      throw new ConflictException(`Document with ID ${id} already exists`);
    }

    const now = new Date().toISOString();
    const folderPath = normalizePath(input.folderPath ?? ROOT_PATH);
    const document: StoredDocument = {
      id,
      title: input.title,
      body: input.body,
      tags: [...(input.tags ?? [])],
      folderPath,
      createdAt: now,
      lastAccessed: now,
    };

    this.searchEngine.index(id, document.title, document.body, document.tags);
    this.folders.addFolder(folderPath);
    this.folders.addDocumentToFolder(folderPath, id);
    this.documents.set(id, document);

    this.logger.log(`Created document ${id} in ${folderPath}`);
    return copyDocument(document);
  }

  /**
   * Fetch a document and count the read as an access
   */
  getDocument(id: string): StoredDocument {
    const document = this.findOrFail(id);
    document.lastAccessed = new Date().toISOString();
    this.searchEngine.recordAccess(id);
    return copyDocument(document);
  }

  updateDocument(id: string, patch: UpdateDocumentInput): StoredDocument {
    const document = this.findOrFail(id);

    if (patch.title !== undefined) document.title = patch.title;
    if (patch.body !== undefined) document.body = patch.body;
    if (patch.tags !== undefined) document.tags = [...patch.tags];

    this.searchEngine.update(id, patch);
    this.logger.log(`Updated document ${id}`);
    return copyDocument(document);
  }

  deleteDocument(id: string): void {
    const document = this.findOrFail(id);

    this.folders.removeDocumentFromFolder(document.folderPath, id);
    this.searchEngine.remove(id);
    this.documents.delete(id);
    this.logger.log(`Deleted document ${id}`);
  }

  moveDocument(id: string, folderPath: string): StoredDocument {
    const document = this.findOrFail(id);
    const target = normalizePath(folderPath);

    this.folders.removeDocumentFromFolder(document.folderPath, id);
    this.folders.addFolder(target);
    this.folders.addDocumentToFolder(target, id);
    document.folderPath = target;

    this.logger.log(`Moved document ${id} to ${target}`);
    return copyDocument(document);
  }

  listDocuments(folderPath?: string): StoredDocument[] {
    if (folderPath === undefined) {
      return Array.from(this.documents.values(), copyDocument);
    }

    const folder = this.folders.getFolder(folderPath);
    if (!folder) {
      throw new NotFoundException(`Folder ${normalizePath(folderPath)} not found`);
    }

    const result: StoredDocument[] = [];
    for (const id of folder.documentIds) {
      const document = this.documents.get(id);
      if (document) {
        result.push(copyDocument(document));
      }
    }
    return result;
  }

  createFolder(path: string): FolderSummary {
    const folder = this.folders.addFolder(path);
    this.logger.log(`Created folder ${folder.path}`);
    return folder.summarize();
  }

  /**
   * Delete a folder and its subfolders. Documents anywhere in the subtree
   * move to the deleted folder's parent.
   * @returns number of relocated documents
   */
  deleteFolder(path: string): number {
    const normalized = normalizePath(path);
    const folder = this.folders.getFolder(normalized);
    if (!folder) {
      throw new NotFoundException(`Folder ${normalized} not found`);
    }

    const parent = folder.parent;
    if (!parent) {
      throw new BadRequestException('The root folder cannot be deleted');
    }

    let relocated = 0;
    for (const node of this.collectSubtree(folder)) {
      for (const id of node.documentIds) {
        const document = this.documents.get(id);
        if (!document) continue;
        parent.documentIds.add(id);
        document.folderPath = parent.path;
        relocated++;
      }
    }

    this.folders.deleteFolder(normalized);
    this.logger.log(
      `Deleted folder ${normalized}, relocated ${relocated} document(s) to ${parent.path}`,
    );
    return relocated;
  }

  listFolders(order: TraversalOrder = 'dfs'): FolderSummary[] {
    return order === 'bfs'
      ? this.folders.traverseBreadthFirst()
      : this.folders.traverseDepthFirst();
  }

  search(query: string, topK: number = this.config.defaultTopK): SearchOutcome {
    const startTime = Date.now();
    const results = this.searchEngine.search(query, topK);

    return {
      query,
      results,
      count: results.length,
      took: Date.now() - startTime,
    };
  }

  autocomplete(prefix: string, limit: number = this.config.defaultSuggestLimit): SuggestOutcome {
    const suggestions = this.searchEngine.autocomplete(prefix, limit);
    return { prefix, suggestions, count: suggestions.length };
  }

  clearCache(): void {
    this.searchEngine.clearCache();
    this.logger.log('Search cache cleared');
  }

  getStats(): OrganizerStats {
    return {
      ...this.searchEngine.getStats(),
      folderCount: this.folders.size,
    };
  }

  private findOrFail(id: string): StoredDocument {
    const document = this.documents.get(id);
    if (!document) {
      this.logger.warn(`Document ${id} not found`);
      throw new NotFoundException(`Document with ID ${id} not found`);
    }
    return document;
  }

  private collectSubtree(folder: FolderNode): FolderNode[] {
    const nodes: FolderNode[] = [];
    const stack: FolderNode[] = [folder];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      nodes.push(node);
      stack.push(...node.children.values());
    }
    return nodes;
  }
}
