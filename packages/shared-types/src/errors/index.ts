export { ErrorCode } from "./error-codes";
export { ErrorMessages } from "./error-messages";
