/**
 * The pre-checkout cart: game ids in the order the visitor added them.
 * Every operation returns a new cart; persisting it is up to the caller.
 */
export type Cart = readonly number[];

export interface CartChange {
  cart: number[];
  size: number;
  changed: boolean;
}

export function addToCart(cart: Cart, gameId: number): CartChange {
  if (cart.includes(gameId)) {
    return { cart: [...cart], size: cart.length, changed: false };
  }

  const next = [...cart, gameId];
  return { cart: next, size: next.length, changed: true };
}

export function removeFromCart(cart: Cart, gameId: number): CartChange {
  if (!cart.includes(gameId)) {
    return { cart: [...cart], size: cart.length, changed: false };
  }

  const next = cart.filter((id) => id !== gameId);
  return { cart: next, size: next.length, changed: true };
}

export function clearCart(): CartChange {
  return { cart: [], size: 0, changed: true };
}

/**
 * Reads a stored cart, dropping anything that is not a positive integer
 * and repeated ids.
 */
export function normalizeCart(value: unknown): number[] {
  if (!Array.isArray(value)) return [];

  const seen = new Set<number>();
  for (const entry of value) {
    const id = typeof entry === "string" ? Number(entry) : entry;
    if (typeof id === "number" && Number.isInteger(id) && id > 0) seen.add(id);
  }
  return [...seen];
}
