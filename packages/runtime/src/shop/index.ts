export { CATEGORY_SYNONYMS, canonicalCategory } from './categories.js';
export { queryCatalog, parsePrice, findProduct, roundMoney, formatPrice } from './catalog.js';
export { createShopSession, resetShopSession, cartPosition, type ShopSessionOptions } from './session.js';
export {
  addToCart,
  clearCart,
  viewCart,
  type AddToCartRequest,
  type AddToCartResult,
  type CartLineView,
  type CartOperationOptions,
} from './cart.js';
export {
  createOrder,
  placeOrder,
  lastOrder,
  type CreateOrderOptions,
  type PlaceOrderOptions,
} from './orders.js';
export {
  SHOP_PROMPT,
  MAX_LISTED_PRODUCTS,
  withPrompt,
  renderWelcome,
  renderListing,
  renderAdded,
  renderCart,
  renderOrderPlaced,
  renderLastOrder,
  renderOrderHistory,
} from './render.js';
export {
  createShoppingTools,
  describeShopError,
  SHOP_FAILURE_TEXT,
  type ShoppingTools,
  type ShoppingToolsOptions,
} from './tools.js';
