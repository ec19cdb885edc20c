export { createGatewayApp, type GatewayOptions } from "./app.js";
export { startGateway, type StartGatewayOptions } from "./server.js";
