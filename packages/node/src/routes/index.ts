/**
 * Route barrel — re-exports all route factories.
 */

export { createHealthRoutes } from "./health.js";
export { createCodecRoutes } from "./codec.js";
export { createWalletRoutes } from "./wallet.js";
export { createMinterRoutes } from "./minter.js";
export { createChainRoutes } from "./chain.js";
export { createEventRoutes } from "./events.js";
