// examples/gossip_simulation.ts
//
// Demonstrates: Spreading one rumor through a large simulated network
// Run: npx tsx examples/gossip_simulation.ts [nodes] [peersPerNode] [outputDir]
//
// This example shows:
// - Building N gossip nodes over an in-memory network
// - Wiring a random topology and originating a message from a random node
// - Measuring reach once propagation settles
// - Exporting topology, clusters and message traces for a visualizer
//
// Environment: GOSSIPNET_LOG_LEVEL, GOSSIPNET_MAX_TTL,
// GOSSIPNET_QUEUE_CAPACITY, GOSSIPNET_BASE_PORT

import { NetworkBuilder, configFromEnv, createLogger, loggerConfig } from "../src";

async function main(): Promise<void> {
  const [nodesArg, peersArg, outputDir = "output"] = process.argv.slice(2);
  const nodeCount = Number(nodesArg ?? 1000);
  const peersPerNode = Number(peersArg ?? 4);

  const env = configFromEnv();
  loggerConfig.configure({ level: env.logLevel ?? "info" });
  const log = createLogger("GossipSimulation");

  const builder = NetworkBuilder.inMemory({ ...env.options, ...env.network });
  builder.createNodes(nodeCount);
  builder.buildRandomTopology(peersPerNode);
  builder.startAllNodes();

  const started = builder.initiateGossip("Hello from the gossip network!");
  await builder.waitForQuiescence({ timeoutMs: 30000 });

  const report = builder.reachability();
  log.info("Gossip results", {
    origin: started?.originId,
    networkSize: report.total,
    reached: report.reached,
    percentage: report.percentage.toFixed(1),
    totalMessagesSent: report.totalMessagesSent,
    avgMessagesPerNode: (report.totalMessagesSent / Math.max(report.total, 1)).toFixed(1),
  });

  const components = builder.analyzer().findConnectedComponents();
  log.info("Connectivity", {
    components: components.length,
    largest: Math.max(0, ...components.map((c) => c.length)),
  });

  await builder.closeAllNodes();
  await builder.writeVisualizationData(outputDir);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
