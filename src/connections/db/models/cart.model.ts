// Cart Model - one cart per caller-supplied session_id

import { CartItem } from './cart-item.model';

export type Cart = {
  id: number;
  session_id: string; // unique, max 128
  created_at: Date;
};

export type CartWithItems = Cart & {
  items: CartItem[];
};
