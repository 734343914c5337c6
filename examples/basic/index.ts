/**
 * Basic nlroute example
 *
 * This example demonstrates:
 *   - Building an RTM_NEWROUTE request and encoding it
 *   - Decoding it back, attributes included
 *   - Decoding the short dump request `ip link show` sends
 *   - Passing messages no family claims through unchanged
 *
 * Settings come from NLROUTE_MAX_NESTING_DEPTH and NLROUTE_LOG_LEVEL.
 */

import { NetlinkFlags, isUnrecognized, loadCodecConfig } from "@nlroute/codec";
import {
  AddressFamily,
  RTM_GETLINK,
  RouteProtocol,
  RouteTable,
  RouteType,
  createRouteCodec,
  defaultRouteHeader,
  type RouteMessage,
} from "@nlroute/families";

function hex(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => byte.toString(16).padStart(2, "0")).join(" ");
}

function main() {
  console.log("=== nlroute Basic Example ===\n");

  const configResult = loadCodecConfig();
  if (configResult.isErr()) {
    console.error("Invalid configuration:", configResult.error.message);
    process.exitCode = 1;
    return;
  }
  const codec = createRouteCodec({ config: configResult.unwrap() });

  // Step 1: Encode a route
  console.log("1. Encoding `ip route add 10.1.0.0/24 via 192.0.2.254 dev 2 mtu 1400`...");
  const request: RouteMessage = {
    family: "route",
    operation: "new",
    envelope: {
      flags: NetlinkFlags.REQUEST | NetlinkFlags.ACK | NetlinkFlags.CREATE | NetlinkFlags.EXCL,
      sequence: 1,
      portId: 0,
    },
    header: {
      ...defaultRouteHeader(AddressFamily.INET),
      destinationPrefixLength: 24,
      table: RouteTable.MAIN,
      protocol: RouteProtocol.STATIC,
      routeType: RouteType.UNICAST,
    },
    attributes: [
      { type: "destination", value: "10.1.0.0" },
      { type: "gateway", value: "192.0.2.254" },
      { type: "oif", value: 2 },
      { type: "metrics", value: [{ type: "mtu", value: 1400 }] },
    ],
  };

  const encoded = codec.encode(request);
  if (encoded.isErr()) {
    console.error("Failed to encode route:", encoded.error.message);
    process.exitCode = 1;
    return;
  }
  const bytes = encoded.unwrap();
  console.log(`   ${bytes.length} bytes: ${hex(bytes)}`);

  // Step 2: Decode it back
  console.log("\n2. Decoding the request...");
  const decoded = codec.decode(bytes);
  if (decoded.isErr()) {
    console.error("Failed to decode route:", decoded.error.message);
    process.exitCode = 1;
    return;
  }
  const route = decoded.unwrap();
  if (!isUnrecognized(route)) {
    console.log(`   ${route.family}/${route.operation}`);
    for (const attribute of route.attributes) {
      console.log(`   ${attribute.type}: ${JSON.stringify(attribute.value)}`);
    }
  }

  // Step 3: Short dump request
  console.log("\n3. Decoding a link dump request with a 4-byte body...");
  const dump = new Uint8Array(20);
  const view = new DataView(dump.buffer);
  view.setUint32(0, 20, true);
  view.setUint16(4, RTM_GETLINK, true);
  view.setUint16(6, NetlinkFlags.REQUEST | NetlinkFlags.DUMP, true);
  dump[16] = AddressFamily.PACKET;
  const dumpResult = codec.decode(dump);
  if (dumpResult.isOk()) {
    console.log(`   ${JSON.stringify(dumpResult.unwrap())}`);
  } else {
    console.error("   Failed to decode dump request:", dumpResult.error.message);
  }

  // Step 4: Unrecognized messages
  console.log("\n4. Passing NLMSG_DONE through...");
  const done = new Uint8Array(20);
  new DataView(done.buffer).setUint32(0, 20, true);
  done[4] = 3;
  const doneResult = codec.decode(done);
  if (doneResult.isOk() && isUnrecognized(doneResult.unwrap())) {
    const reencoded = codec.encode(doneResult.unwrap()).unwrapOr(new Uint8Array(0));
    console.log(`   Unrecognized type 3, re-encoded: ${hex(reencoded)}`);
  }

  console.log("\n=== Example completed successfully! ===");
}

main();
