// @wayfarer/gateway: composition root, tool registrations and channels

export { Gateway, createGateway, type GatewayDeps, type CreateGatewayOptions } from "./gateway";
export { buildToolRegistry, type ToolRegistrationDeps } from "./tool-registrations";
export { MessageTool } from "./tools/message-tool";
export { CliChannel, CLI_CHANNEL, type CliChannelOptions } from "./channels/cli-channel";
