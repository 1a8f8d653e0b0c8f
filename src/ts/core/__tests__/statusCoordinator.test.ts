/**
 * Unit tests for the status coordinator, wired to real trackers over fake platform sources
 */

import { createDefaultConfig } from '../config';
import { ContractError, DisposedError, ProbeError } from '../errors';
import { GatewayTracker } from '../gatewayTracker';
import { ProbeEngine } from '../probeEngine';
import { StatusCoordinator } from '../statusCoordinator';
import { TopologyTracker } from '../topologyTracker';
import {
  ApDetails,
  InterfaceSource,
  NamedApStore,
  NetworkChangeListener,
  NetworkChangeSource,
  NetworkInterfaceInfo,
  PingReply,
  Status,
  WirelessInfoSource,
  WirelessQueryResult
} from '../types';

const KITCHEN = 'AA:BB:CC:DD:EE:01';
const HALL = 'AA:BB:CC:DD:EE:02';

function iface(gateway: string): NetworkInterfaceInfo {
  return { name: 'eth0', index: 1, up: true, loopback: false, ipv4: true, gateways: [gateway], speedMbps: 1000 };
}

function connected(bssid: string, signal: number): WirelessQueryResult {
  return {
    kind: 'ok',
    output: `State : connected\nSSID : HomeNet\nAP BSSID : ${bssid}\nChannel : 36\nSignal : ${signal}%\n`
  };
}

class FakeInterfaces implements InterfaceSource {
  current: NetworkInterfaceInfo[] = [iface('192.168.1.1')];
  list = jest.fn(async () => this.current);
}

class FakeChanges implements NetworkChangeSource {
  available = true;
  failSubscribe = false;
  listeners: NetworkChangeListener[] = [];

  isNetworkAvailable(): boolean {
    return this.available;
  }

  subscribe(listener: NetworkChangeListener): () => void {
    if (this.failSubscribe) {
      throw new Error('notifications unavailable');
    }
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  setAvailable(available: boolean): void {
    this.available = available;
    this.listeners.forEach((l) => l.onAvailabilityChanged(available));
  }
}

class FakeWireless implements WirelessInfoSource {
  next: WirelessQueryResult = { kind: 'ok', output: 'State : disconnected\n' };
  query = jest.fn(async () => this.next);
}

class FakeStore implements NamedApStore {
  names: Record<string, string> = { [KITCHEN]: 'Kitchen', [HALL]: 'Hall' };
  saved: string | null = null;
  recordSeen = jest.fn<Promise<void>, [string, ApDetails?]>().mockResolvedValue(undefined);
  setLastCustomTarget = jest.fn(async (value: string | null) => {
    this.saved = value;
  });

  getDisplayName(bssid: string | null): string {
    return bssid === null ? 'Not Connected' : this.names[bssid] ?? bssid;
  }

  getLastCustomTarget(): string | null {
    return this.saved;
  }
}

function flush(): Promise<void> {
  return jest.advanceTimersByTimeAsync(0);
}

describe('StatusCoordinator', () => {
  let interfaces: FakeInterfaces;
  let changes: FakeChanges;
  let wireless: FakeWireless;
  let store: FakeStore;
  let ping: jest.Mock<Promise<PingReply>, [string, number]>;
  let resolveHost: jest.Mock<Promise<string[]>, [string]>;
  let statuses: Status[];
  let coordinator: StatusCoordinator;

  function createCoordinator(): StatusCoordinator {
    const config = createDefaultConfig();
    const gateway = new GatewayTracker(interfaces, changes, config);
    const topology = new TopologyTracker(wireless, config);
    const probe = new ProbeEngine({ ping }, gateway, config);
    return new StatusCoordinator({
      config,
      gateway,
      topology,
      probe,
      store,
      resolveHost,
      sink: { onStatusChanged: (status) => statuses.push(status) }
    });
  }

  beforeEach(() => {
    jest.useFakeTimers();
    interfaces = new FakeInterfaces();
    changes = new FakeChanges();
    wireless = new FakeWireless();
    store = new FakeStore();
    ping = jest.fn<Promise<PingReply>, [string, number]>().mockResolvedValue({ status: 'success', roundTripMs: 4 });
    resolveHost = jest.fn<Promise<string[]>, [string]>().mockResolvedValue([]);
    statuses = [];
    coordinator = createCoordinator();
  });

  afterEach(() => {
    coordinator.stop();
    jest.useRealTimers();
  });

  describe('default gateway', () => {
    test('should publish pending, then the round-trip time', async () => {
      await coordinator.start();
      await flush();

      expect(statuses.map((s) => s.displayText)).toEqual(['--', '4']);
      expect(coordinator.status()).toEqual({
        displayText: '4',
        tooltipLines: ['Gateway 192.168.1.1: 4ms'],
        isError: false,
        isTransition: false,
        useDarkText: false
      });
      expect(ping).toHaveBeenCalledTimes(1);
      expect(ping).toHaveBeenCalledWith('192.168.1.1', 1000);
    });

    test('should probe on the configured interval without republishing an unchanged status', async () => {
      await coordinator.start();
      await flush();

      await jest.advanceTimersByTimeAsync(3000);

      expect(ping).toHaveBeenCalledTimes(4);
      expect(statuses).toHaveLength(2);
    });

    test('should show X when the probe fails', async () => {
      ping.mockResolvedValue({ status: 'timeout' });

      await coordinator.start();
      await flush();

      expect(coordinator.status().displayText).toBe('X');
      expect(coordinator.status().tooltipLines).toEqual(['Gateway 192.168.1.1: Timed out']);
      expect(coordinator.status().isError).toBe(true);
    });

    test('should show ! when the probe cannot be sent', async () => {
      ping.mockRejectedValue(new ProbeError('other', '192.168.1.1', 'ping not found'));

      await coordinator.start();
      await flush();

      expect(coordinator.status().displayText).toBe('!');
      expect(coordinator.status().tooltipLines).toEqual(['Gateway 192.168.1.1: Ping error (ping not found)']);
    });

    test('should show GW? and not probe when there is no gateway', async () => {
      interfaces.current = [];

      await coordinator.start();
      await jest.advanceTimersByTimeAsync(3000);

      expect(coordinator.status().displayText).toBe('GW?');
      expect(ping).not.toHaveBeenCalled();
    });

    test('should show OFF and not probe when the network is down', async () => {
      changes.available = false;

      await coordinator.start();
      await jest.advanceTimersByTimeAsync(3000);

      expect(coordinator.status().displayText).toBe('OFF');
      expect(coordinator.status().tooltipLines).toEqual(['Error: network unavailable']);
      expect(ping).not.toHaveBeenCalled();
    });

    test('should follow the network going down and coming back', async () => {
      await coordinator.start();
      await flush();

      changes.setAvailable(false);
      expect(coordinator.status().displayText).toBe('OFF');

      changes.setAvailable(true);
      expect(coordinator.status().displayText).toBe('--');

      await jest.advanceTimersByTimeAsync(1000);
      await flush();

      expect(coordinator.status().displayText).toBe('4');
      expect(statuses.map((s) => s.displayText)).toEqual(['--', '4', 'OFF', '--', '4']);
    });

    test('should probe the new gateway when it changes', async () => {
      await coordinator.start();
      await flush();

      interfaces.current = [iface('10.0.0.1')];
      await jest.advanceTimersByTimeAsync(30000);
      await flush();

      expect(ping).toHaveBeenLastCalledWith('10.0.0.1', 1000);
      expect(coordinator.resolvedAddress()).toEqual({ address: '10.0.0.1', resolutionError: false });
      expect(coordinator.status().tooltipLines).toEqual(['Gateway 10.0.0.1: 4ms']);
    });
  });

  describe('custom host', () => {
    test('should resolve the host, prefer IPv4 and remember it', async () => {
      resolveHost.mockResolvedValue(['2001:db8::7', '198.51.100.7']);
      await coordinator.start();
      await flush();

      await coordinator.useCustomHost('  example.test ');
      await flush();

      expect(resolveHost).toHaveBeenCalledWith('example.test');
      expect(ping).toHaveBeenLastCalledWith('198.51.100.7', 1000);
      expect(store.setLastCustomTarget).toHaveBeenLastCalledWith('example.test');
      expect(coordinator.currentTarget()).toEqual({ kind: 'customHost', userInput: 'example.test' });
      expect(coordinator.status().tooltipLines).toEqual(['example.test (198.51.100.7): 4ms', 'Gateway: 192.168.1.1']);
    });

    test('should fall back to IPv6 when there is no IPv4 address', async () => {
      resolveHost.mockResolvedValue(['2001:db8::7']);
      await coordinator.start();

      await coordinator.useCustomHost('v6only.test');

      expect(coordinator.resolvedAddress()).toEqual({ address: '2001:db8::7', resolutionError: false });
    });

    test('should use an IP literal without a lookup', async () => {
      await coordinator.start();
      await flush();

      await coordinator.useCustomHost('203.0.113.5');
      await flush();

      expect(resolveHost).not.toHaveBeenCalled();
      expect(ping).toHaveBeenLastCalledWith('203.0.113.5', 1000);
      expect(coordinator.status().tooltipLines[0]).toBe('203.0.113.5: 4ms');
    });

    test('should show DNS? for an unresolvable host and still probe it as typed', async () => {
      resolveHost.mockRejectedValue(new Error('ENOTFOUND'));
      ping.mockRejectedValue(new ProbeError('dnsError', 'nowhere.test', 'could not find host'));
      await coordinator.start();
      await flush();

      await coordinator.useCustomHost('nowhere.test');
      await flush();

      expect(ping).toHaveBeenLastCalledWith('nowhere.test', 1000);
      expect(coordinator.resolvedAddress()).toEqual({ address: 'nowhere.test', resolutionError: true });
      expect(coordinator.status().displayText).toBe('DNS?');
      expect(coordinator.status().tooltipLines).toEqual(['nowhere.test: unresolvable (DNS)', 'Gateway: 192.168.1.1']);
    });

    test('should show NET when the network goes down', async () => {
      await coordinator.start();
      await flush();
      await coordinator.useCustomHost('203.0.113.5');
      await flush();

      changes.setAvailable(false);

      expect(coordinator.status().displayText).toBe('NET');
    });

    test('should reject an empty host synchronously', async () => {
      await coordinator.start();

      expect(() => coordinator.useCustomHost('   ')).toThrow(ContractError);
      expect(coordinator.currentTarget()).toEqual({ kind: 'defaultGateway' });
    });

    test('should restore the saved target on start', async () => {
      store.saved = 'example.test';
      resolveHost.mockResolvedValue(['198.51.100.7']);

      await coordinator.start();
      await flush();

      expect(coordinator.currentTarget()).toEqual({ kind: 'customHost', userInput: 'example.test' });
      expect(ping).toHaveBeenCalledWith('198.51.100.7', 1000);
      expect(ping).not.toHaveBeenCalledWith('192.168.1.1', 1000);
    });

    test('should keep the custom target when the gateway changes', async () => {
      await coordinator.start();
      await flush();
      await coordinator.useCustomHost('203.0.113.5');
      await flush();

      interfaces.current = [iface('10.0.0.1')];
      await jest.advanceTimersByTimeAsync(30000);

      expect(coordinator.resolvedAddress().address).toBe('203.0.113.5');
      expect(coordinator.status().tooltipLines).toEqual(['203.0.113.5: 4ms', 'Gateway: 10.0.0.1']);
    });

    test('useDefaultGateway should switch back and forget the saved host', async () => {
      await coordinator.start();
      await flush();
      await coordinator.useCustomHost('203.0.113.5');
      await flush();

      coordinator.useDefaultGateway();
      await flush();

      expect(coordinator.currentTarget()).toEqual({ kind: 'defaultGateway' });
      expect(store.setLastCustomTarget).toHaveBeenLastCalledWith(null);
      expect(ping).toHaveBeenLastCalledWith('192.168.1.1', 1000);
      expect(coordinator.status().tooltipLines).toEqual(['Gateway 192.168.1.1: 4ms']);
    });

    test('useDefaultGateway should not carry the custom host reading over to the gateway', async () => {
      await coordinator.start();
      await flush();
      ping.mockResolvedValueOnce({ status: 'success', roundTripMs: 250 });
      await coordinator.useCustomHost('203.0.113.5');
      await flush();
      expect(coordinator.status().displayText).toBe('250');

      let answer: (reply: PingReply) => void = () => undefined;
      ping.mockImplementationOnce(() => new Promise<PingReply>((resolve) => {
        answer = resolve;
      }));
      await jest.advanceTimersByTimeAsync(1000);
      coordinator.useDefaultGateway();

      expect(coordinator.status().displayText).toBe('--');
      expect(coordinator.status().tooltipLines).toEqual(['Initializing...']);

      answer({ status: 'success', roundTripMs: 250 });
      await flush();
      expect(coordinator.status().displayText).toBe('--');

      await jest.advanceTimersByTimeAsync(1000);
      await flush();
      expect(ping).toHaveBeenLastCalledWith('192.168.1.1', 1000);
      expect(coordinator.status().displayText).toBe('4');
    });

    test('should drop a late lookup for a target that was replaced', async () => {
      let answer: (addresses: string[]) => void = () => undefined;
      resolveHost.mockImplementationOnce(() => new Promise<string[]>((resolve) => {
        answer = resolve;
      }));
      await coordinator.start();
      await flush();

      const slow = coordinator.useCustomHost('slow.test');
      await coordinator.useCustomHost('203.0.113.5');
      answer(['198.51.100.99']);
      await slow;
      await flush();

      expect(coordinator.currentTarget()).toEqual({ kind: 'customHost', userInput: '203.0.113.5' });
      expect(coordinator.resolvedAddress().address).toBe('203.0.113.5');
      expect(ping).not.toHaveBeenCalledWith('198.51.100.99', 1000);
    });
  });

  test('should discard a probe result for a previous target', async () => {
    const replies: Array<(reply: PingReply) => void> = [];
    ping.mockImplementation(() => new Promise<PingReply>((resolve) => {
      replies.push(resolve);
    }));
    await coordinator.start();
    expect(replies).toHaveLength(1);

    await coordinator.useCustomHost('203.0.113.5');
    replies[0]({ status: 'success', roundTripMs: 4 });
    await flush();

    expect(coordinator.status().displayText).toBe('--');
    expect(coordinator.status().tooltipLines[0]).toBe('Initializing...');
  });

  describe('topology', () => {
    test('should not treat the first association as a transition', async () => {
      wireless.next = connected(KITCHEN, 80);

      await coordinator.start();
      await flush();

      expect(coordinator.status()).toEqual({
        displayText: '4',
        tooltipLines: ['Gateway 192.168.1.1: 4ms', 'AP: Kitchen', 'Signal: 80%'],
        isError: false,
        isTransition: false,
        useDarkText: false
      });
      expect(store.recordSeen).toHaveBeenCalledWith(KITCHEN, { band: '5 GHz', ssid: 'HomeNet' });
    });

    test('should mark a roam as a transition for the window', async () => {
      wireless.next = connected(KITCHEN, 80);
      await coordinator.start();
      await flush();

      wireless.next = connected(HALL, 60);
      await jest.advanceTimersByTimeAsync(1000);

      expect(coordinator.status()).toEqual({
        displayText: '4',
        tooltipLines: ['Gateway 192.168.1.1: 4ms', 'AP: Hall', 'Signal: 60%', 'Roaming: Kitchen -> Hall'],
        isError: false,
        isTransition: true,
        useDarkText: true
      });
      expect(coordinator.topologyState()).toMatchObject({ bssid: HALL, previousBssid: KITCHEN, inTransition: true });

      await jest.advanceTimersByTimeAsync(9999);
      expect(coordinator.status().isTransition).toBe(true);

      await jest.advanceTimersByTimeAsync(1);
      expect(coordinator.status().isTransition).toBe(false);
      expect(coordinator.status().tooltipLines).toEqual(['Gateway 192.168.1.1: 4ms', 'AP: Hall', 'Signal: 60%']);
    });

    test('should restart the window on another roam', async () => {
      wireless.next = connected(KITCHEN, 80);
      await coordinator.start();
      await flush();

      wireless.next = connected(HALL, 60);
      await jest.advanceTimersByTimeAsync(1000);
      await jest.advanceTimersByTimeAsync(4000);
      wireless.next = connected(KITCHEN, 80);
      await jest.advanceTimersByTimeAsync(1000);

      await jest.advanceTimersByTimeAsync(5000);
      expect(coordinator.status().isTransition).toBe(true);
      expect(coordinator.status().tooltipLines).toContain('Roaming: Hall -> Kitchen');

      await jest.advanceTimersByTimeAsync(5000);
      expect(coordinator.status().isTransition).toBe(false);
    });

    test('should keep probing during a transition', async () => {
      wireless.next = connected(KITCHEN, 80);
      await coordinator.start();
      await flush();
      wireless.next = connected(HALL, 60);
      await jest.advanceTimersByTimeAsync(1000);
      ping.mockClear();

      await jest.advanceTimersByTimeAsync(3000);

      expect(ping).toHaveBeenCalledTimes(3);
    });

    test('should show a failed probe during a transition without dark text', async () => {
      wireless.next = connected(KITCHEN, 80);
      await coordinator.start();
      await flush();
      wireless.next = connected(HALL, 60);
      ping.mockResolvedValue({ status: 'timeout' });

      await jest.advanceTimersByTimeAsync(2000);

      expect(coordinator.status().displayText).toBe('X');
      expect(coordinator.status().isTransition).toBe(true);
      expect(coordinator.status().useDarkText).toBe(false);
    });

    test('should show the permission line when wireless queries are denied', async () => {
      wireless.next = { kind: 'denied', detail: 'location permission is required' };

      await coordinator.start();
      await flush();

      expect(coordinator.status().tooltipLines).toEqual(['Gateway 192.168.1.1: 4ms', 'Wi-Fi: location permission required']);
    });

    test('should log a failed store write and carry on', async () => {
      store.recordSeen.mockRejectedValue(new Error('disk full'));
      wireless.next = connected(KITCHEN, 80);

      await coordinator.start();
      await flush();

      expect(coordinator.status().tooltipLines).toContain('AP: Kitchen');
    });
  });

  describe('scenarios', () => {
    test('should show 23 for a 23 ms reply from the gateway', async () => {
      ping.mockResolvedValue({ status: 'success', roundTripMs: 23 });

      await coordinator.start();
      await flush();

      expect(coordinator.status().displayText).toBe('23');
      expect(coordinator.status().isError).toBe(false);
    });

    test('should show OFF at once even with a probe in flight', async () => {
      let answer: (reply: PingReply) => void = () => undefined;
      ping.mockImplementationOnce(() => new Promise<PingReply>((resolve) => {
        answer = resolve;
      }));
      await coordinator.start();

      changes.setAvailable(false);
      expect(coordinator.status().displayText).toBe('OFF');

      answer({ status: 'success', roundTripMs: 23 });
      await flush();
      expect(coordinator.status().displayText).toBe('OFF');
      expect(coordinator.status().isError).toBe(true);
    });

    test('should mark an invalid host as a DNS problem rather than a probe failure', async () => {
      resolveHost.mockRejectedValue(new Error('ENOTFOUND'));
      ping.mockResolvedValue({ status: 'timeout' });
      await coordinator.start();
      await flush();

      await coordinator.useCustomHost('example.invalid');
      await flush();

      expect(coordinator.status().isError).toBe(true);
      expect(coordinator.status().displayText).toBe('DNS?');
      expect(coordinator.status().tooltipLines[0]).toBe('example.invalid: unresolvable (DNS)');
    });
  });

  describe('lifecycle', () => {
    test('should show INIT! and rethrow when the gateway tracker cannot start', async () => {
      changes.failSubscribe = true;

      await expect(coordinator.start()).rejects.toThrow('notifications unavailable');
      await flush();

      expect(coordinator.status().displayText).toBe('INIT!');
      expect(ping).not.toHaveBeenCalled();
    });

    test('should report pending before start even while the network is down', () => {
      changes.available = false;

      expect(coordinator.status()).toEqual({
        displayText: '--',
        tooltipLines: ['Initializing...'],
        isError: false,
        isTransition: false,
        useDarkText: false
      });
    });

    test('should ignore a second start', async () => {
      await coordinator.start();
      await coordinator.start();
      await flush();

      expect(interfaces.list).toHaveBeenCalledTimes(1);
      expect(wireless.query).toHaveBeenCalledTimes(1);
    });

    test('stop should silence everything and reject further calls', async () => {
      await coordinator.start();
      await flush();
      const published = statuses.length;

      coordinator.stop();
      coordinator.stop();
      ping.mockClear();
      wireless.query.mockClear();
      await jest.advanceTimersByTimeAsync(60000);

      expect(ping).not.toHaveBeenCalled();
      expect(wireless.query).not.toHaveBeenCalled();
      expect(statuses).toHaveLength(published);
      await expect(coordinator.start()).rejects.toBeInstanceOf(DisposedError);
      expect(() => coordinator.useDefaultGateway()).toThrow(DisposedError);
      expect(() => coordinator.useCustomHost('example.test')).toThrow(DisposedError);
    });

    test('should survive a throwing sink', async () => {
      let calls = 0;
      coordinator.stop();
      coordinator = new StatusCoordinator({
        config: createDefaultConfig(),
        gateway: new GatewayTracker(interfaces, changes, createDefaultConfig()),
        topology: new TopologyTracker(wireless, createDefaultConfig()),
        probe: new ProbeEngine({ ping }, { forceRefresh: async () => false }, createDefaultConfig()),
        store,
        resolveHost,
        sink: {
          onStatusChanged: () => {
            calls++;
            throw new Error('display gone');
          }
        }
      });

      await coordinator.start();
      await flush();

      expect(calls).toBe(2);
      expect(coordinator.status().displayText).toBe('4');
    });
  });
});
