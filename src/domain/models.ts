export interface Item {
  id: number;
  name: string;
  description: string | null;
  price: number;
  quantity: number;
}

// an item before the store assigns its id
export type NewItem = Omit<Item, 'id'>;

// only keys present on the patch are applied; description: null clears it
export interface ItemPatch {
  name?: string;
  description?: string | null;
  price?: number;
  quantity?: number;
}

export interface CreateItemRequest {
  name: string;
  description?: string | null;
  price: number;
  quantity?: number;
}

export type UpdateItemRequest = ItemPatch;

export interface ItemList {
  items: Item[];
  count: number;
}
