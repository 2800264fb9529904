export * from "./difficulty-policy";
