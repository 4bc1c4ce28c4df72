#!/usr/bin/env node
/**
 * Document Chat MCP Server - CLI Entry Point
 *
 * Usage:
 *   docchat-mcp                  # after npm install -g
 *   node dist/src/bin.js         # direct invocation
 *
 * @module bin
 */

import './index.js';
