/**
 * Quagga configuration model, diffing and vtysh plumbing.
 */

export * from "./context-tree.js";
export * from "./differ.js";
export * from "./commands.js";
export * from "./ipv6.js";
export * from "./loader.js";
export * from "./vtysh.js";
