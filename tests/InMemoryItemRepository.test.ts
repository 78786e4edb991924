import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryItemRepository } from '../src/infrastructure/repositories/InMemoryItemRepository.js';
import { NewItem } from '../src/domain/models.js';

describe('InMemoryItemRepository', () => {
  let repository: InMemoryItemRepository;

  beforeEach(() => {
    repository = new InMemoryItemRepository();
  });

  const makeItem = (name: string, price = 1.5): NewItem => ({
    name,
    description: null,
    price,
    quantity: 0,
  });

  describe('create', () => {
    it('assigns sequential ids starting at 1', async () => {
      const first = await repository.create(makeItem('first'));
      const second = await repository.create(makeItem('second'));

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(repository.getItemCount()).toBe(2);
    });

    it('never reuses an id after delete', async () => {
      await repository.create(makeItem('first'));
      const second = await repository.create(makeItem('second'));
      await repository.delete(second.id);

      const third = await repository.create(makeItem('third'));
      expect(third.id).toBe(3);
    });

    it('keeps counting after the store is cleared', async () => {
      await repository.create(makeItem('first'));
      repository.clearAllItems();

      const next = await repository.create(makeItem('second'));
      expect(next.id).toBe(2);
      expect(repository.getItemCount()).toBe(1);
    });
  });

  describe('findById', () => {
    it('returns a copy of the stored item', async () => {
      const created = await repository.create(makeItem('widget'));
      const found = await repository.findById(created.id);

      expect(found).toEqual(created);

      if (found) found.name = 'mutated';
      const again = await repository.findById(created.id);
      expect(again?.name).toBe('widget');
    });

    it('returns null for a missing id', async () => {
      expect(await repository.findById(42)).toBeNull();
    });
  });

  describe('findAll', () => {
    it('lists items in insertion order', async () => {
      await repository.create(makeItem('a'));
      await repository.create(makeItem('b'));
      await repository.create(makeItem('c'));

      const items = await repository.findAll();
      expect(items.map((item) => item.name)).toEqual(['a', 'b', 'c']);
    });

    it('returns an empty list for an empty store', async () => {
      expect(await repository.findAll()).toEqual([]);
    });
  });

  describe('update', () => {
    it('applies only the fields on the patch', async () => {
      const created = await repository.create({
        name: 'widget',
        description: 'small',
        price: 2,
        quantity: 4,
      });

      const updated = await repository.update(created.id, { quantity: 7 });

      expect(updated).toEqual({
        id: created.id,
        name: 'widget',
        description: 'small',
        price: 2,
        quantity: 7,
      });
    });

    it('clears description when the patch sets it to null', async () => {
      const created = await repository.create({ ...makeItem('widget'), description: 'small' });

      const updated = await repository.update(created.id, { description: null });
      expect(updated?.description).toBeNull();
    });

    it('returns null for a missing id', async () => {
      expect(await repository.update(9, { name: 'ghost' })).toBeNull();
    });
  });

  describe('delete', () => {
    it('removes and returns the item', async () => {
      const created = await repository.create(makeItem('widget'));
      const deleted = await repository.delete(created.id);

      expect(deleted).toEqual(created);
      expect(repository.getItemCount()).toBe(0);
      expect(await repository.findById(created.id)).toBeNull();
    });

    it('returns a copy of the removed item', async () => {
      const created = await repository.create(makeItem('widget'));
      const deleted = await repository.delete(created.id);

      if (deleted) deleted.name = 'mutated';
      expect(created.name).toBe('widget');
      expect(deleted).not.toBe(created);
    });

    it('returns null for a missing id', async () => {
      expect(await repository.delete(5)).toBeNull();
    });
  });
});
