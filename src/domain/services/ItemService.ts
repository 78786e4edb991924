import { Item, ItemList, ItemPatch, NewItem } from '../models.js';
import { IItemRepository } from '../../infrastructure/repositories/IItemRepository.js';
import { ValidationError, ResourceNotFoundError } from '../errors/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasKey(input: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(input, key);
}

// item operations over an injected store. inputs to create/update come
// straight off the wire, so they're checked here before the store sees them
export class ItemService {
  constructor(private readonly repository: IItemRepository) {}

  async listItems(): Promise<ItemList> {
    const items = await this.repository.findAll();
    return { items, count: items.length };
  }

  async getItem(id: number): Promise<Item> {
    this.validateItemId(id);
    const item = await this.repository.findById(id);
    if (!item) throw new ResourceNotFoundError('Item', id);
    return item;
  }

  async createItem(input: unknown): Promise<Item> {
    if (!isRecord(input)) {
      throw new ValidationError('Item must be an object.');
    }
    if (!hasKey(input, 'name')) {
      throw new ValidationError('Item name is required.');
    }
    if (!hasKey(input, 'price')) {
      throw new ValidationError('Item price is required.');
    }

    const item: NewItem = {
      name: this.validateName(input.name),
      description: hasKey(input, 'description')
        ? this.validateDescription(input.description)
        : null,
      price: this.validatePrice(input.price),
      quantity: hasKey(input, 'quantity') ? this.validateQuantity(input.quantity) : 0,
    };

    return this.repository.create(item);
  }

  // applies only the keys present on the input; id can't be changed
  async updateItem(id: number, input: unknown): Promise<Item> {
    this.validateItemId(id);
    if (!isRecord(input)) {
      throw new ValidationError('Item update must be an object.');
    }

    const patch: ItemPatch = {};
    if (hasKey(input, 'name')) patch.name = this.validateName(input.name);
    if (hasKey(input, 'description')) {
      patch.description = this.validateDescription(input.description);
    }
    if (hasKey(input, 'price')) patch.price = this.validatePrice(input.price);
    if (hasKey(input, 'quantity')) patch.quantity = this.validateQuantity(input.quantity);

    const item = await this.repository.update(id, patch);
    if (!item) throw new ResourceNotFoundError('Item', id);
    return item;
  }

  async deleteItem(id: number): Promise<Item> {
    this.validateItemId(id);
    const item = await this.repository.delete(id);
    if (!item) throw new ResourceNotFoundError('Item', id);
    return item;
  }

  private validateItemId(id: number): void {
    // integers past the safe range can't be in the store; the lookup 404s
    if (!Number.isInteger(id)) {
      throw new ValidationError('Invalid item ID. Expected an integer.');
    }
  }

  private validateName(name: unknown): string {
    if (typeof name !== 'string' || name.length === 0) {
      throw new ValidationError('Item name must be a non-empty string.');
    }
    return name;
  }

  private validateDescription(description: unknown): string | null {
    if (description === null || typeof description === 'string') return description;
    throw new ValidationError('Item description must be a string or null.');
  }

  private validatePrice(price: unknown): number {
    if (typeof price !== 'number' || !Number.isFinite(price)) {
      throw new ValidationError('Item price must be a number.');
    }
    return price;
  }

  private validateQuantity(quantity: unknown): number {
    if (typeof quantity !== 'number' || !Number.isSafeInteger(quantity)) {
      throw new ValidationError('Item quantity must be a safe integer.');
    }
    return quantity;
  }
}
