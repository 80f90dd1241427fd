export * from "./GeocodeCache";
export * from "./GeocodeCacheDefault";
export * from "./GeocodeCacheStore";
export * from "./GeocodeCacheStoreJson";
