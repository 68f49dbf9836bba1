/**
 * Errors module
 *
 * The four failure kinds the client surfaces.
 */

export {
  RegistryError,
  TransportError,
  ProtocolError,
  DecodeError,
  ConfigError,
  subcodeForStatus,
  isRegistryError,
  describeError,
  type ErrorKind,
  type TransportSubcode,
  type ProtocolSubcode,
} from "./errors";
