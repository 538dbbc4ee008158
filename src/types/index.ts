export * from "./kubernetes";
export * from "./guard";
