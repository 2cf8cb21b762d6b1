import os from 'node:os';

export type InterfaceTable = ReturnType<typeof os.networkInterfaces>;

const WILDCARD_HOSTS = new Set(['0.0.0.0', '::', '']);

/** First external IPv4 address, e.g. the one a phone on the same Wi-Fi can reach. */
export function lanAddress(interfaces: InterfaceTable = os.networkInterfaces()): string | undefined {
  for (const infos of Object.values(interfaces)) {
    const match = infos?.find((info) => info.family === 'IPv4' && !info.internal);
    if (match) return match.address;
  }
  return undefined;
}

export type ListenUrls = {
  local: string;
  network?: string;
};

/**
 * Addresses to print once the server is listening. A wildcard bind is shown
 * as localhost plus the LAN address, since neither 0.0.0.0 nor :: opens in a
 * browser.
 */
export function listenUrls(host: string, port: number, interfaces?: InterfaceTable): ListenUrls {
  if (!WILDCARD_HOSTS.has(host)) return { local: `http://${host}:${port}` };
  const ip = lanAddress(interfaces);
  return {
    local: `http://localhost:${port}`,
    ...(ip ? { network: `http://${ip}:${port}` } : {}),
  };
}
