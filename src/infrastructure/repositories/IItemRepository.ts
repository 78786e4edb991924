import { Item, ItemPatch, NewItem } from '../../domain/models.js';

export interface IItemRepository {
  findAll(): Promise<Item[]>;
  findById(id: number): Promise<Item | null>;
  create(item: NewItem): Promise<Item>;
  update(id: number, patch: ItemPatch): Promise<Item | null>;
  delete(id: number): Promise<Item | null>;
}
