import {
  EntityTypeRegistry,
  createDefaultTypeRegistry
} from '../../../src/application/registry/EntityTypeRegistry';
import { BaseEntity, EntityInit } from '../../../src/domain/entities/BaseEntity';
import { EntityLookupError, InvalidArgumentError } from '../../../src/domain/errors/EntityStoreError';
import { EntityStorage } from '../../../src/domain/repositories/EntityStorage';
import { createMockStorage } from '../../helpers/mocks';

class Tagged extends BaseEntity {
  readonly positional: unknown[];

  constructor(storage: EntityStorage, init?: EntityInit, ...positional: unknown[]) {
    super(storage, init, ...positional);
    this.positional = positional;
  }

  get typeName(): string {
    return 'Tagged';
  }
}

const record = {
  id: 'tagged-1',
  created_at: '2026-01-02T03:04:05.006Z',
  updated_at: '2026-01-02T03:04:05.006Z',
  __class__: 'Tagged',
  label: 'red'
};

describe('EntityTypeRegistry', () => {
  let registry: EntityTypeRegistry;
  let storage: jest.Mocked<EntityStorage>;

  beforeEach(() => {
    registry = new EntityTypeRegistry();
    storage = createMockStorage();
  });

  describe('register', () => {
    it('should register a factory', () => {
      const factory = jest.fn((s: EntityStorage, r: EntityInit) => new BaseEntity(s, r));

      registry.register('BaseEntity', factory);

      expect(registry.has('BaseEntity')).toBe(true);
      expect(registry.get('BaseEntity')).toBe(factory);
      expect(registry.getRegisteredTypes()).toEqual(['BaseEntity']);
    });

    it('should refuse a second factory for the same type', () => {
      registry.registerClass('Tagged', Tagged);

      expect(() => registry.registerClass('Tagged', Tagged)).toThrow(InvalidArgumentError);
      expect(() => registry.registerClass('Tagged', Tagged)).toThrow('Entity type already registered: Tagged');
    });

    it('should unregister a type', () => {
      registry.registerClass('Tagged', Tagged);

      expect(registry.unregister('Tagged')).toBe(true);
      expect(registry.unregister('Tagged')).toBe(false);
      expect(registry.has('Tagged')).toBe(false);
    });
  });

  describe('create', () => {
    it('should rebuild an entity through its factory', () => {
      registry.registerClass('Tagged', Tagged);

      const entity = registry.create('Tagged', storage, record);

      expect(entity).toBeInstanceOf(Tagged);
      expect(entity.id).toBe('tagged-1');
      expect(entity.getAttribute('label')).toBe('red');
      expect(storage.add).not.toHaveBeenCalled();
    });

    it('should pass the type name as an ignored positional argument', () => {
      registry.registerClass('Tagged', Tagged);

      const entity = registry.create('Tagged', storage, record);

      expect(entity instanceof Tagged && entity.positional).toEqual(['Tagged']);
    });

    it('should hand the storage and record to a custom factory', () => {
      const factory = jest.fn((s: EntityStorage, r: EntityInit) => new BaseEntity(s, r));
      registry.register('Custom', factory);

      registry.create('Custom', storage, record);

      expect(factory).toHaveBeenCalledWith(storage, record);
    });

    it('should fail for an unknown type', () => {
      expect(() => registry.create('Ghost', storage, record)).toThrow(EntityLookupError);
      expect(() => registry.create('Ghost', storage, record)).toThrow('Unknown entity type: Ghost');
    });
  });

  describe('createDefaultTypeRegistry', () => {
    it('should know the base entity only', () => {
      const defaults = createDefaultTypeRegistry();

      expect(defaults.getRegisteredTypes()).toEqual(['BaseEntity']);
      expect(defaults.create('BaseEntity', storage, { ...record, __class__: 'BaseEntity' })).toBeInstanceOf(
        BaseEntity
      );
    });
  });
});
