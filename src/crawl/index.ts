export * from "./contactExtractor";
export * from "./crawler";
export * from "./htmlParser";
export * from "./siteNormalizer";
