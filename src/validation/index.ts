export {
  isIpAddress,
  renderExports,
  validateEnvironment,
  type EnvCheck,
  type EnvCheckLevel,
  type EnvReport,
} from "./validation";
export { hasAddressFormat, isEthereumAddress, toChecksumAddress } from "./wallet";
