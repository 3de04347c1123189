// Row shapes are type aliases rather than interfaces so they satisfy pg's QueryResultRow
export * from './product.model';
export * from './product-variant.model';
export * from './product-image.model';
export * from './product-recommendation.model';
export * from './cart.model';
export * from './cart-item.model';
export * from './review.model';
