export * from "./errors/error-ids";
export * from "./errors/serial.errors";
