export * from "./api-responses";
export * from "./crud";
