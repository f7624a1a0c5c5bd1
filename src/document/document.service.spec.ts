import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import searchConfig from '../config/search.config';
import { SearchEngine } from '../search/search-engine';
import { DocumentService } from './document.service';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('DocumentService', () => {
  let service: DocumentService;
  let searchEngine: SearchEngine;

  beforeEach(async () => {
    searchEngine = new SearchEngine({ cacheCapacity: 10 });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DocumentService,
        { provide: SearchEngine, useValue: searchEngine },
        {
          provide: searchConfig.KEY,
          useValue: { cacheCapacity: 10, defaultTopK: 2, defaultSuggestLimit: 3 },
        },
      ],
    }).compile();

    service = module.get<DocumentService>(DocumentService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('createDocument', () => {
    it('should store, index and file the document', () => {
      const created = service.createDocument({
        id: 'doc-1',
        title: 'Meeting Notes',
        body: 'quarterly planning',
        tags: ['work'],
        folderPath: 'work/notes/',
      });

      expect(created).toMatchObject({
        id: 'doc-1',
        title: 'Meeting Notes',
        body: 'quarterly planning',
        tags: ['work'],
        folderPath: '/work/notes',
      });
      expect(created.createdAt).toBe(created.lastAccessed);
      expect(searchEngine.has('doc-1')).toBe(true);
      expect(service.listDocuments('/work/notes').map((doc) => doc.id)).toEqual(['doc-1']);
    });

    it('should generate an id and default to the root folder', () => {
      const created = service.createDocument({ title: 'Untitled', body: 'draft' });

      expect(created.id).toMatch(UUID_V4);
      expect(created.folderPath).toBe('/');
      expect(created.tags).toEqual([]);
    });

    it('should reject a duplicate id', () => {
      service.createDocument({ id: 'doc-1', title: 'a', body: 'b' });

      expect(() => service.createDocument({ id: 'doc-1', title: 'c', body: 'd' })).toThrow(
        ConflictException,
      );
    });
  });

  describe('getDocument', () => {
    it('should record an access', () => {
      service.createDocument({ id: 'doc-1', title: 'a', body: 'b' });
      const recordAccess = jest.spyOn(searchEngine, 'recordAccess');

      expect(service.getDocument('doc-1').id).toBe('doc-1');
      expect(recordAccess).toHaveBeenCalledWith('doc-1');
    });

    it('should throw for an unknown id', () => {
      expect(() => service.getDocument('missing')).toThrow(NotFoundException);
    });
  });

  describe('updateDocument', () => {
    it('should merge the patch and re-index', () => {
      service.createDocument({ id: 'doc-1', title: 'Old', body: 'alpha', tags: ['x'] });

      const updated = service.updateDocument('doc-1', { body: 'beta' });

      expect(updated).toMatchObject({ title: 'Old', body: 'beta', tags: ['x'] });
      expect(service.search('alpha').count).toBe(0);
      expect(service.search('beta').results.map((result) => result.id)).toEqual(['doc-1']);
    });

    it('should throw for an unknown id', () => {
      expect(() => service.updateDocument('missing', { title: 'x' })).toThrow(NotFoundException);
    });
  });

  describe('deleteDocument', () => {
    it('should drop the document everywhere', () => {
      service.createDocument({ id: 'doc-1', title: 'a', body: 'gamma', folderPath: '/f' });

      service.deleteDocument('doc-1');

      expect(searchEngine.has('doc-1')).toBe(false);
      expect(service.listDocuments()).toEqual([]);
      expect(service.listDocuments('/f')).toEqual([]);
      expect(() => service.deleteDocument('doc-1')).toThrow(NotFoundException);
    });
  });

  describe('moveDocument', () => {
    it('should move membership and create the target folder', () => {
      service.createDocument({ id: 'doc-1', title: 'a', body: 'b', folderPath: '/inbox' });

      const moved = service.moveDocument('doc-1', '/archive/2024');

      expect(moved.folderPath).toBe('/archive/2024');
      expect(service.listDocuments('/inbox')).toEqual([]);
      expect(service.listDocuments('/archive/2024').map((doc) => doc.id)).toEqual(['doc-1']);
    });
  });

  describe('listDocuments', () => {
    it('should throw for an unknown folder', () => {
      expect(() => service.listDocuments('/missing')).toThrow(NotFoundException);
    });
  });

  describe('folders', () => {
    it('should create a folder and report its summary', () => {
      expect(service.createFolder('projects/search')).toEqual({
        path: '/projects/search',
        name: 'search',
        memberCount: 0,
        childCount: 0,
      });
    });

    it('should relocate documents of a deleted subtree to the parent', () => {
      service.createDocument({ id: 'doc-1', title: 'a', body: 'b', folderPath: '/work' });
      service.createDocument({ id: 'doc-2', title: 'c', body: 'd', folderPath: '/work/old' });
      service.createDocument({ id: 'doc-3', title: 'e', body: 'f', folderPath: '/work/old/deep' });

      expect(service.deleteFolder('/work/old')).toBe(2);

      expect(service.listDocuments('/work').map((doc) => doc.id).sort()).toEqual([
        'doc-1',
        'doc-2',
        'doc-3',
      ]);
      expect(service.getDocument('doc-3').folderPath).toBe('/work');
      expect(service.listFolders().map((folder) => folder.path)).toEqual(['/', '/work']);
    });

    it('should refuse to delete the root', () => {
      expect(() => service.deleteFolder('/')).toThrow(BadRequestException);
    });

    it('should throw for an unknown folder', () => {
      expect(() => service.deleteFolder('/missing')).toThrow(NotFoundException);
    });

    it('should list folders in either order', () => {
      service.createFolder('/a/c');
      service.createFolder('/b');

      expect(service.listFolders('dfs').map((folder) => folder.path)).toEqual([
        '/',
        '/a',
        '/a/c',
        '/b',
      ]);
      expect(service.listFolders('bfs').map((folder) => folder.path)).toEqual([
        '/',
        '/a',
        '/b',
        '/a/c',
      ]);
    });
  });

  describe('search and autocomplete', () => {
    beforeEach(() => {
      service.createDocument({ id: 'a', title: 'Apple Pie', body: 'apple pie recipe' });
      service.createDocument({ id: 'b', title: 'Apple Cider', body: 'apple cider recipe' });
      service.createDocument({ id: 'c', title: 'Apple Tart', body: 'apple tart recipe' });
    });

    it('should use the configured default topK', () => {
      const outcome = service.search('apple');

      expect(outcome.query).toBe('apple');
      expect(outcome.count).toBe(2);
      expect(outcome.results.map((result) => result.id)).toEqual(['a', 'b']);
      expect(outcome.took).toBeGreaterThanOrEqual(0);
    });

    it('should use the configured default suggestion limit', () => {
      service.createDocument({ id: 'd', title: 'Apricot', body: 'apron application' });

      expect(service.autocomplete('ap')).toEqual({
        prefix: 'ap',
        suggestions: ['apple', 'application', 'apricot'],
        count: 3,
      });
    });

    it('should clear the cache and report stats', () => {
      service.search('apple');
      expect(service.getStats().cachedQueries).toBe(1);

      service.clearCache();

      expect(service.getStats()).toEqual({
        documentCount: 3,
        vocabularySize: 5,
        suggestionCount: 5,
        cachedQueries: 0,
        cacheCapacity: 10,
        folderCount: 1,
      });
    });
  });
});
