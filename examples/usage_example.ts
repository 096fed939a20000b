import { HostnameColumnCodec } from "../codecs/HostnameColumnCodec";
import { HostnameEncoder } from "../core/HostnameEncoder";

const hostnames = [
  "www.example.com",
  "mail.example.com",
  "api.eu.example.com",
  "cdn.example.net",
  "static.cdn.example.net",
  "www.example.org",
  "WWW.Example.COM",
];

function main() {
  console.log("=== Hostname Suffix Compression Usage Example ===\n");

  const encoder = new HostnameEncoder();

  let rawBytes = 0;
  let compressedBytes = 0;

  for (const name of hostnames) {
    const compressed = encoder.compressHostname(name);
    const restored = encoder.decompressHostname(compressed);

    rawBytes += Buffer.byteLength(name);
    compressedBytes += compressed.length;

    console.log(
      `${name.padEnd(24)} -> ${compressed.toString("hex").padEnd(12)} -> ${restored}`
    );
  }

  const stats = encoder.stats();
  console.log("\nDictionary:");
  console.log(`  labels:       ${stats.labelCount}`);
  console.log(`  buffer bytes: ${stats.bytesUsed} (capacity ${stats.capacity})`);
  console.log(`  max depth:    ${stats.maxDepth}`);
  console.log(`  suffixes:     ${encoder.suffixes().join(", ")}`);

  console.log("\nSize:");
  console.log(`  raw:        ${rawBytes} bytes`);
  console.log(`  compressed: ${compressedBytes} bytes`);

  const codec = new HostnameColumnCodec(encoder);
  const column = codec.encode(hostnames);
  console.log(`  as column:  ${column.length} bytes`);

  const decoded = codec.decode(column);
  console.log(
    `\nColumn round trip ${decoded.length === hostnames.length ? "OK" : "FAILED"}`
  );
}

main();
