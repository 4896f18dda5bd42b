#!/usr/bin/env node
/**
 * Study Helper MCP Server - CLI Entry Point
 *
 * Usage:
 *   study-helper-mcp                    # after npm install -g
 *   node dist/bin.js                    # direct invocation
 *
 * @module bin
 */

import './index.js';
