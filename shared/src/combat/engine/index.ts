export * from "./turn-manager";
export * from "./death-saves";
export * from "./encounter";
