export * from "./Logger";
export * from "./LoggerConsole";
export * from "./RfsTransport";
export * from "./createDefaultLogger";
