export {
  formatZodIssues,
  safeValidate,
  safeParseYaml,
  safeParseJson,
  type FriendlyError,
  type ParseErrorType,
  type ParseResult,
} from "./friendly-errors";
