// Tests for the connection state machine, driven through the fake transport

import { describe, it, expect, vi } from "vitest";
import { ConnectionSocket, type ConnectionSocketOptions } from "./connection.ts";
import type { ConnectionConfigInput } from "./config.ts";
import type { ConnectionSocketDelegate } from "./delegate.ts";
import {
  ConnectionError,
  TransportError,
  systemErrorDescriptions,
  type ErrorDescriptions,
} from "./errors.ts";
import { SerialQueue } from "./queue.ts";
import { acceptAnyTrustPolicy, type TrustObject } from "./trust.ts";
import {
  FakeTransportProvider,
  RecordingDelegate,
  settle,
  type RecordedEvent,
} from "./testing/fake_transport.ts";

const fixedDescriptions: ErrorDescriptions = {
  describePosix: (code) => (code === 54 ? "Connection reset by peer" : undefined),
  describeTls: (code) => (code === "CERT_HAS_EXPIRED" ? "The server certificate has expired" : undefined),
};

const encoder = new TextEncoder();

const trust: TrustObject = {
  certificateChain: [new Uint8Array([0x30, 0x01]), new Uint8Array([0x30, 0x02])],
  policyName: "SSL (irc.example.net)",
  authorized: true,
};

function setup(input: Partial<ConnectionConfigInput> = {}, options: ConnectionSocketOptions = {}) {
  const provider = new FakeTransportProvider();
  const delegate = new RecordingDelegate();
  const log = vi.fn();
  const socket = new ConnectionSocket(
    { serverAddress: "irc.example.net", serverPort: 6667, ...input },
    provider,
    delegate,
    { errorDescriptions: fixedDescriptions, log, ...options },
  );
  return { provider, delegate, socket, log };
}

async function connected(input: Partial<ConnectionConfigInput> = {}, options: ConnectionSocketOptions = {}) {
  const fixture = setup(input, options);
  fixture.socket.open();
  fixture.provider.latest.emit({ kind: "ready" });
  await settle();
  return fixture;
}

function lastError(events: RecordedEvent[]): ConnectionError {
  const last = events[events.length - 1];
  if (last?.event !== "disconnectedWith") throw new Error("last event is not disconnectedWith");
  return last.error;
}

describe("ConnectionSocket lifecycle", () => {
  it("connects, frames lines and disconnects", async () => {
    const { provider, delegate, socket } = setup();

    expect(socket.state).toBe("disconnected");
    socket.open();

    expect(socket.state).toBe("connecting");
    expect(socket.isConnecting).toBe(true);
    expect(delegate.events).toEqual([{ event: "willConnect", address: "irc.example.net", port: 6667 }]);

    const handle = provider.latest;
    expect(handle.address).toBe("irc.example.net");
    expect(handle.port).toBe(6667);
    expect(handle.parameters.tls).toBeUndefined();
    expect(handle.parameters.preferNoProxies).toBe(true);

    handle.emit({ kind: "ready" });
    await settle();

    expect(socket.state).toBe("connected");
    expect(socket.isConnected).toBe(true);
    expect(socket.isSecured).toBe(false);
    expect(socket.connectedHost).toBe("irc.example.net");
    expect(handle.receives).toHaveLength(1);
    expect(handle.receives[0].minLength).toBe(0);
    expect(handle.receives[0].maxLength).toBe(65536);

    handle.deliver(":irc.example.net 001 tester :Welcome\r\nPING :tok");
    await settle();
    handle.deliver("en-1\r\n");
    await settle();

    expect(delegate.lines()).toEqual([":irc.example.net 001 tester :Welcome", "PING :token-1"]);
    expect(handle.receives).toHaveLength(1);

    socket.close();
    expect(socket.state).toBe("disconnecting");
    expect(socket.isDisconnecting).toBe(true);

    await settle();

    expect(socket.state).toBe("disconnected");
    expect(handle.cancelCalls).toBe(1);
    expect(socket.connectedHost).toBeUndefined();
    expect(delegate.names()).toEqual([
      "willConnect",
      "didConnect",
      "received",
      "received",
      "disconnected",
    ]);
  });

  it("reports no host when the transport has no remote endpoint", async () => {
    const { provider, delegate, socket } = setup();
    socket.open();
    provider.latest.endpoint = undefined;
    provider.latest.emit({ kind: "ready" });
    await settle();

    expect(delegate.events[1]).toEqual({ event: "didConnect", host: undefined });
  });

  it("uses the configured read length and label", async () => {
    const { provider, socket } = await connected({ maximumReadLength: 512, label: "libera" });

    expect(socket.label).toBe("libera");
    expect(provider.latest.queue?.label).toBe("ircsock.libera");
    expect(provider.latest.receives[0].maxLength).toBe(512);
  });

  it("labels unnamed sockets by id", () => {
    const { socket } = setup();
    expect(socket.label).toBe(`socket-${socket.id}`);
  });

  it("logs informational statuses without changing state", async () => {
    const { provider, socket, log } = setup();
    socket.open();
    provider.latest.emit({ kind: "preparing" });
    await settle();

    expect(socket.state).toBe("connecting");
    expect(log).toHaveBeenCalledWith("%s: status changed to %s", socket.label, "preparing");
  });
});

describe("ConnectionSocket TLS", () => {
  const tlsInput: Partial<ConnectionConfigInput> = {
    serverPort: 6697,
    prefersSecuredConnection: true,
    cipherSuites: ["TLS_AES_128_GCM_SHA256"],
    prefersModernCiphersOnly: true,
    proxyType: "system",
    clientIdentity: { certificate: "cert-pem", privateKey: "key-pem", passphrase: "test-secret" },
  };

  it("passes TLS parameters to the provider", () => {
    const { provider, socket } = setup(tlsInput);
    socket.open();

    const { parameters } = provider.latest;
    expect(parameters.preferNoProxies).toBe(false);
    expect(parameters.tls?.cipherSuites).toEqual(["TLS_AES_128_GCM_SHA256"]);
    expect(parameters.tls?.modernCiphersOnly).toBe(true);
    expect(parameters.tls?.clientIdentity).toEqual({
      certificate: "cert-pem",
      privateKey: "key-pem",
      passphrase: "test-secret",
    });
  });

  it("verifies trust, then reports connected and secured", async () => {
    const { provider, delegate, socket } = setup(tlsInput);
    socket.open();
    const handle = provider.latest;

    await expect(handle.verify(trust)).resolves.toBe(true);
    expect(socket.state).toBe("securing");
    expect(socket.isConnecting).toBe(true);

    handle.metadata = { negotiatedProtocol: "TLSv1.3", negotiatedCipherSuite: "TLS_AES_128_GCM_SHA256" };
    handle.emit({ kind: "ready" });
    await settle();

    expect(socket.state).toBe("secured");
    expect(socket.isSecured).toBe(true);
    expect(socket.isConnected).toBe(true);
    expect(delegate.events.slice(1)).toEqual([
      { event: "didConnect", host: "irc.example.net" },
      { event: "securedWith", protocolVersion: "TLSv1.3", cipherSuite: "TLS_AES_128_GCM_SHA256" },
    ]);
    expect(socket.tlsNegotiatedProtocol).toBe("TLSv1.3");
    expect(socket.tlsNegotiatedCipherSuite).toBe("TLS_AES_128_GCM_SHA256");
    expect(socket.tlsPolicyName).toBe("SSL (irc.example.net)");
    expect(socket.tlsCertificateChain).toEqual(trust.certificateChain);
  });

  it("rejects an unauthorized chain under the system policy", async () => {
    const { provider, delegate, socket } = setup(tlsInput);
    socket.open();
    const handle = provider.latest;

    await expect(handle.verify({ ...trust, authorized: false })).resolves.toBe(false);

    handle.emit({ kind: "failed", error: TransportError.tls("CERT_HAS_EXPIRED", "certificate has expired") });
    await settle();

    expect(socket.state).toBe("disconnected");
    expect(delegate.disconnects()).toBe(1);
    const error = lastError(delegate.events);
    expect(error.kind).toBe("tls");
    expect(error.reason).toBe("The server certificate has expired");
    expect(socket.tlsPolicyName).toBeUndefined();
  });

  it("uses the configured trust policy", async () => {
    const { provider, socket } = setup(tlsInput, { trustPolicy: acceptAnyTrustPolicy });
    socket.open();

    await expect(provider.latest.verify({ ...trust, authorized: false })).resolves.toBe(true);
  });

  it("rejects trust evaluation outside of connecting", async () => {
    const { provider, socket } = await connected(tlsInput, { trustPolicy: acceptAnyTrustPolicy });

    await expect(provider.latest.verify(trust)).resolves.toBe(false);
    expect(socket.state).toBe("connected");
  });
});

describe("ConnectionSocket errors", () => {
  it("reports a posix failure exactly once", async () => {
    const { provider, delegate, socket } = setup();
    socket.open();
    const handle = provider.latest;

    handle.emit({ kind: "failed", error: TransportError.posix(54) });
    handle.emit({ kind: "cancelled" });
    await settle();

    expect(socket.state).toBe("disconnected");
    expect(delegate.names()).toEqual(["willConnect", "disconnectedWith"]);
    const error = lastError(delegate.events);
    expect(error.kind).toBe("posix");
    expect(error.code).toBe(54);
    expect(error.message).toBe("Connection reset by peer");
  });

  it("closes when the transport is waiting", async () => {
    const { provider, delegate, socket } = setup();
    socket.open();
    const handle = provider.latest;

    handle.emit({
      kind: "waiting",
      error: TransportError.posix(61, "connect ECONNREFUSED 127.0.0.1:6667"),
    });
    await settle();

    expect(handle.cancelCalls).toBe(1);
    expect(socket.state).toBe("disconnected");
    expect(delegate.disconnects()).toBe(1);
    const error = lastError(delegate.events);
    expect(error.kind).toBe("posix");
    expect(error.code).toBe(61);
    expect(error.message).toBe("Unknown error 61");
  });

  it("reports posix 54 with the system description", async () => {
    const { provider, delegate, socket } = setup({}, { errorDescriptions: systemErrorDescriptions });
    socket.open();

    provider.latest.emit({ kind: "failed", error: TransportError.posix(54) });
    await settle();

    expect(socket.state).toBe("disconnected");
    expect(delegate.names()).toEqual(["willConnect", "disconnectedWith"]);
    const error = lastError(delegate.events);
    expect(error.kind).toBe("posix");
    expect(error.code).toBe(54);
    expect(error.message).toBe(systemErrorDescriptions.describePosix(54) ?? "Unknown error 54");
  });

  it("closes when the delegate fails on a received line", async () => {
    const provider = new FakeTransportProvider();
    const events: string[] = [];
    const socket = new ConnectionSocket(
      { serverAddress: "irc.example.net", serverPort: 6667 },
      provider,
      {
        received: (line) => {
          const text = new TextDecoder().decode(line);
          events.push(text);
          if (text === "BAD") throw new Error("cannot parse");
        },
        disconnectedWith: (error) => events.push(`${error.kind}: ${error.message}`),
      },
      { log: vi.fn() },
    );
    socket.open();
    const handle = provider.latest;
    handle.emit({ kind: "ready" });
    await settle();

    handle.deliver("GOOD\r\nBAD\r\nNEVER\r\n");
    await settle();

    expect(socket.state).toBe("disconnected");
    expect(handle.cancelCalls).toBe(1);
    expect(handle.receives).toHaveLength(0);
    expect(events).toEqual([
      "GOOD",
      "BAD",
      "generic: Delegate failed to handle a received line: cannot parse",
    ]);
  });

  it("prefers the caller's close reason over the transport's error", async () => {
    const { provider, delegate, socket } = await connected();
    const handle = provider.latest;

    handle.emit({ kind: "failed", error: TransportError.posix(54) });
    socket.close(ConnectionError.tls("handshake aborted by user"));
    await settle();

    expect(delegate.disconnects()).toBe(1);
    const error = lastError(delegate.events);
    expect(error.kind).toBe("tls");
    expect(error.reason).toBe("handshake aborted by user");
  });

  it("turns a string close reason into a generic error", async () => {
    const { delegate, socket } = await connected();

    socket.close("Quit requested");
    await settle();

    const error = lastError(delegate.events);
    expect(error.kind).toBe("generic");
    expect(error.message).toBe("Quit requested");
  });

  it("translates a transport error given as close reason", async () => {
    const { delegate, socket } = await connected();

    socket.close(TransportError.posix(54));
    await settle();

    const error = lastError(delegate.events);
    expect(error.kind).toBe("posix");
    expect(error.code).toBe(54);
  });

  it("closes on a read error", async () => {
    const { provider, delegate, socket } = await connected();
    const handle = provider.latest;

    handle.failReceive(TransportError.posix(54));
    await settle();

    expect(handle.cancelCalls).toBe(1);
    expect(socket.state).toBe("disconnected");
    expect(delegate.names()).toEqual(["willConnect", "didConnect", "disconnectedWith"]);
    expect(lastError(delegate.events).code).toBe(54);
  });

  it("closes with a generic error when a read brings neither data nor error", async () => {
    const { provider, delegate, socket } = await connected();

    provider.latest.deliverEnd();
    await settle();

    expect(socket.state).toBe("disconnected");
    const error = lastError(delegate.events);
    expect(error.kind).toBe("generic");
    expect(error.message).toBe("Unexpected condition: there is no data when there is no error");
  });

  it("closes on a write error", async () => {
    const { provider, delegate, socket } = await connected();
    const handle = provider.latest;

    expect(socket.write(encoder.encode("QUIT\r\n"))).toBe(true);
    handle.completeSend(TransportError.posix(54));
    await settle();

    expect(socket.state).toBe("disconnected");
    expect(delegate.names()).toEqual(["willConnect", "didConnect", "willSend", "disconnectedWith"]);
    expect(lastError(delegate.events).message).toBe("Connection reset by peer");
  });
});

describe("ConnectionSocket writes", () => {
  it("allows one outstanding write at a time", async () => {
    const { provider, delegate, socket, log } = await connected();
    const handle = provider.latest;

    expect(socket.write(encoder.encode("NICK tester\r\n"))).toBe(true);
    expect(socket.write(encoder.encode("USER tester 0 * :Tester\r\n"))).toBe(false);
    expect(handle.sends).toHaveLength(1);
    expect(log).toHaveBeenCalledWith(
      "%s: dropped write of %d bytes, a write is already pending",
      socket.label,
      25,
    );

    handle.completeSend();
    await settle();

    expect(socket.write(encoder.encode("USER tester 0 * :Tester\r\n"))).toBe(true);
    expect(delegate.events.slice(2)).toEqual([
      { event: "willSend", data: "NICK tester\r\n" },
      { event: "didSend" },
      { event: "willSend", data: "USER tester 0 * :Tester\r\n" },
    ]);
  });

  it("refuses writes unless connected", () => {
    const { delegate, socket } = setup();

    expect(socket.write(encoder.encode("PING :x\r\n"))).toBe(false);
    socket.open();
    expect(socket.write(encoder.encode("PING :x\r\n"))).toBe(false);
    expect(delegate.names()).toEqual(["willConnect"]);
  });
});

describe("ConnectionSocket state guards", () => {
  it("ignores open unless disconnected", async () => {
    const { provider, socket } = setup();

    socket.open();
    socket.open();
    expect(provider.handles).toHaveLength(1);

    provider.latest.emit({ kind: "ready" });
    await settle();
    socket.open();
    expect(provider.handles).toHaveLength(1);
  });

  it("ignores close when disconnected or already disconnecting", async () => {
    const { provider, delegate, socket } = setup();

    socket.close();
    expect(delegate.events).toEqual([]);

    socket.open();
    socket.close();
    socket.close("ignored");
    await settle();

    expect(provider.latest.cancelCalls).toBe(1);
    expect(delegate.names()).toEqual(["willConnect", "disconnected"]);
  });

  it("ignores ready once close was requested", async () => {
    const { provider, delegate, socket } = setup();
    socket.open();

    provider.latest.emit({ kind: "ready" });
    socket.close();
    await settle();

    expect(socket.state).toBe("disconnected");
    expect(delegate.names()).toEqual(["willConnect", "disconnected"]);
  });

  it("ignores status from a previous attempt", async () => {
    const { provider, delegate, socket, log } = await connected();
    const first = provider.latest;

    socket.close();
    await settle();
    socket.open();
    const second = provider.latest;
    expect(second).not.toBe(first);

    // The first handle's queue is closed on reset; give it a live one
    first.queue = new SerialQueue("stale");
    first.emit({ kind: "failed", error: TransportError.posix(54) });
    await settle();

    expect(socket.state).toBe("connecting");
    expect(delegate.disconnects()).toBe(1);
    expect(log).toHaveBeenCalledWith("%s: ignoring %s from a previous attempt", socket.label, "failed");
  });
});

describe("ConnectionSocket reconnect", () => {
  it("starts from clean state after a disconnect", async () => {
    const { provider, delegate, socket } = await connected();
    const first = provider.latest;

    first.deliver("PARTIAL LINE WITHOUT END");
    await settle();
    expect(socket.write(encoder.encode("PING :x\r\n"))).toBe(true);

    first.emit({ kind: "failed", error: TransportError.posix(54) });
    await settle();
    expect(socket.state).toBe("disconnected");

    socket.open();
    const second = provider.latest;
    second.emit({ kind: "ready" });
    await settle();

    second.deliver("NEW\r\n");
    await settle();

    expect(delegate.lines()).toEqual(["NEW"]);
    expect(socket.write(encoder.encode("PING :y\r\n"))).toBe(true);
    expect(second.sends).toHaveLength(1);
  });

  it("can reopen from inside the disconnect callback", async () => {
    const provider = new FakeTransportProvider();
    let disconnects = 0;
    const delegate: ConnectionSocketDelegate = {
      received: () => {},
      disconnected: () => {
        disconnects++;
        socket.open();
      },
    };
    const socket = new ConnectionSocket(
      { serverAddress: "irc.example.net", serverPort: 6667 },
      provider,
      delegate,
      { log: vi.fn() },
    );

    socket.open();
    provider.latest.emit({ kind: "ready" });
    await settle();
    socket.close();
    await settle();

    expect(disconnects).toBe(1);
    expect(provider.handles).toHaveLength(2);
    expect(socket.state).toBe("connecting");
    expect(provider.latest.queue?.closed).toBe(false);
  });
});
