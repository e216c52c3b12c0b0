/**
 * Cart Types
 *
 * A cart belongs to exactly one user and maps product ids to quantities.
 * It is cleared when an order is placed from it.
 */

export interface CartItem {
  id: string;
  productId: string;
  quantity: number;
}

export interface Cart {
  id: string;
  userId: string;
  items: CartItem[];
  createdAt: string;
  updatedAt: string;
}

export interface AddToCartInput {
  userId: string;
  productId: string;
  quantity?: number;
}

export interface UpdateCartItemInput {
  userId: string;
  productId: string;
  quantity: number;
}

export interface RemoveFromCartInput {
  userId: string;
  productId: string;
}

// ───── Read Models ─────

export interface CartItemReadModel {
  id: string;
  productId: string;
  productName: string;
  unitPrice: number;
  quantity: number;
  lineTotal: number;
}

export interface CartReadModel {
  id: string | null;
  userId: string;
  items: CartItemReadModel[];
  totalItems: number;
  totalAmount: number;
  currency: string;
}
