// src/store/index.ts

export { RedisSessionStore } from "./redis.session.store.js";
export { RedisCatalogStore } from "./redis.catalog.store.js";
