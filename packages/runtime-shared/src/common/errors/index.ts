export { AppError, type ErrorContext } from "./app-error";
export { formatZodIssues, toAppError } from "./wrap-error";
