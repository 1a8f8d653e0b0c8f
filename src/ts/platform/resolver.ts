import { lookup } from 'dns/promises';
import { HostResolver } from '../core/types';

export const resolveHost: HostResolver = async (host) => {
  const results = await lookup(host, { all: true });
  return results.map((entry) => entry.address);
};
