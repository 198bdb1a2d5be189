/**
 * Combat - Main Export
 *
 * Types, pure rule modules and command parsing shared by the server and
 * clients.
 */

// All types
export * from "./types";

// Turn order, death saves, encounter operations
export * from "./engine";

// Command and persisted-shape validation
export * from "./validation";
