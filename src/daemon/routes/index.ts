/**
 * Route exports
 */

export { createContainersRouter, toContainerJson } from "./containers.js";
export { createHealthRouter } from "./health.js";
export { createImagesRouter } from "./images.js";
export { createProxyRouter, PROXY_MOUNT, proxySubPath } from "./proxy.js";
