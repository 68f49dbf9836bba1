export * from "./interfaces";
export {
  createNodeContext,
  nodeFileReader,
  nodeHttpClient,
  nodeNetworkProbe,
  nodeSleep,
  silentLogger,
  systemClock,
} from "./node";
