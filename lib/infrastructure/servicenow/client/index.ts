export * from "./http-client";
export * from "./query-builder";
export * from "./retry-policy";
export * from "./table-allow-list";
export * from "./crud-client";
