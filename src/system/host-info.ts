import os from 'os';

/**
 * Runtime and container facts shown on the dashboard and /info
 */
export interface HostInfo {
  hostname: string;
  nodeVersion: string;
  platform: string;
  arch: string;
  pid: number;
  uptimeSeconds: number;
}

/**
 * Read host facts from the runtime
 * Inside a container the hostname is the short container id
 */
export function collectHostInfo(): HostInfo {
  return {
    hostname: os.hostname(),
    nodeVersion: process.version,
    platform: process.platform,
    arch: process.arch,
    pid: process.pid,
    uptimeSeconds: Math.floor(process.uptime())
  };
}
