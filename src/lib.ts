/**
 * Library entry: the codec layer and device adaptations without the server.
 */

export * from "./constants.js";
export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./core/addressing.js";
export * from "./core/classifier.js";
export * from "./core/fingerprint.js";
export * from "./core/hex.js";
export * from "./core/midi.js";
export * from "./core/name-codec.js";
export * from "./core/packets.js";
export * from "./core/seven-bit.js";
export * from "./devices/index.js";
