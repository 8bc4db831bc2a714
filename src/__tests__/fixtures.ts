import type { FeedMap } from "../feedValue.js";
import { FeedRecord } from "../record.js";

export const NOW = new Date("2025-06-15T12:00:00.000Z");

/** A record that passes every rule without errors, warnings or infos. */
export const validProduct = (): FeedMap => ({
  id: "SKU-1",
  title: "Trail Runner",
  description: "Lightweight trail running shoe",
  link: "https://shop.example.com/p/sku-1",
  gtin: "00012345678905",
  mpn: "TR-100",
  condition: "new",
  product_category: "Apparel & Accessories > Shoes",
  brand: "Acme",
  material: "mesh",
  weight: "0.8 kg",
  age_group: "adult",
  image_link: "https://cdn.example.com/sku-1.jpg",
  price: "79.99 USD",
  availability: "in_stock",
  inventory_quantity: "12",
  shipping: "US:CA:Overnight:16.00 USD",
  seller_name: "Acme Outfitters",
  seller_url: "https://shop.example.com",
  seller_privacy_policy: "https://shop.example.com/privacy",
  seller_tos: "https://shop.example.com/terms",
  updated_at: "2025-01-01T00:00:00Z",
  enable_search: "true",
  enable_checkout: "true",
});

export const recordOf = (map: FeedMap): FeedRecord => FeedRecord.fromMap(map);

export const validWith = (overrides: FeedMap): FeedRecord => recordOf({ ...validProduct(), ...overrides });

export const validWithout = (...fields: string[]): FeedRecord => {
  const map = validProduct();
  for (const f of fields) delete map[f];
  return recordOf(map);
};
