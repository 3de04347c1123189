// CartItem Model

export type CartItem = {
  id: number;
  cart_id: number; // ON DELETE CASCADE
  variant_id: number; // ON DELETE CASCADE
  quantity: number; // > 0
};

export type CreateCartItemInput = {
  cart_id: number;
  variant_id: number;
  quantity: number;
};
