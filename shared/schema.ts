export * from "./models/users";
export * from "./models/charging";
