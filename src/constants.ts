export const SERVER_NAME = 'command-mcp-server';
export const SERVER_VERSION = '0.1.0';
export const USER_AGENT = `${SERVER_NAME}/${SERVER_VERSION}`;
