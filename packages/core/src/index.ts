export * from "./positions.js";
export * from "./roster.js";
export * from "./draftOrder.js";
export * from "./snakeDraft.js";
