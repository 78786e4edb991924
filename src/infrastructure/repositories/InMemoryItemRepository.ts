import { Item, ItemPatch, NewItem } from '../../domain/models.js';
import { IItemRepository } from './IItemRepository.js';

// process-local item store. every method reads and writes the map without
// awaiting in between, so concurrent requests can't interleave mid-mutation
export class InMemoryItemRepository implements IItemRepository {
  private items: Map<number, Item> = new Map();
  private nextId = 1;

  async findAll(): Promise<Item[]> {
    return Array.from(this.items.values(), (item) => ({ ...item }));
  }

  async findById(id: number): Promise<Item | null> {
    const item = this.items.get(id);
    return item ? { ...item } : null;
  }

  async create(item: NewItem): Promise<Item> {
    const stored: Item = {
      id: this.nextId,
      name: item.name,
      description: item.description,
      price: item.price,
      quantity: item.quantity,
    };

    this.items.set(stored.id, stored);
    this.nextId += 1;
    return { ...stored };
  }

  async update(id: number, patch: ItemPatch): Promise<Item | null> {
    const stored = this.items.get(id);
    if (!stored) return null;

    if (patch.name !== undefined) stored.name = patch.name;
    if (patch.description !== undefined) stored.description = patch.description;
    if (patch.price !== undefined) stored.price = patch.price;
    if (patch.quantity !== undefined) stored.quantity = patch.quantity;

    return { ...stored };
  }

  async delete(id: number): Promise<Item | null> {
    const stored = this.items.get(id);
    if (!stored) return null;

    this.items.delete(id);
    return { ...stored };
  }

  // Utility methods for testing
  getItemCount(): number {
    return this.items.size;
  }

  // ids keep counting up after a clear
  clearAllItems(): void {
    this.items.clear();
  }
}
