// Model public API - host-facing types (imports nothing outside model/)

// Text - host positions and offset/line conversion
export * from "./text.js";

// Syntax - the host trees shim fragments arrive as
export * from "./syntax.js";

// Messages - records for the host message sink
export * from "./messages.js";

// Environment - host collaborator and per-environment state
export * from "./environment.js";
