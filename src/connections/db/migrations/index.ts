import { MigrationInfo } from './types';

import * as migration001 from './20251018_000001_create_products_table';
import * as migration002 from './20251018_000002_create_product_variants_table';
import * as migration003 from './20251018_000003_create_product_images_table';
import * as migration004 from './20251018_000004_create_product_recommendations_table';
import * as migration005 from './20251018_000005_create_carts_table';
import * as migration006 from './20251018_000006_create_cart_items_table';
import * as migration007 from './20251018_000007_create_product_reviews_table';

export const migrations: MigrationInfo[] = [
  { name: '20251018_000001_create_products_table', migration: migration001.migration },
  { name: '20251018_000002_create_product_variants_table', migration: migration002.migration },
  { name: '20251018_000003_create_product_images_table', migration: migration003.migration },
  { name: '20251018_000004_create_product_recommendations_table', migration: migration004.migration },
  { name: '20251018_000005_create_carts_table', migration: migration005.migration },
  { name: '20251018_000006_create_cart_items_table', migration: migration006.migration },
  { name: '20251018_000007_create_product_reviews_table', migration: migration007.migration },
];
