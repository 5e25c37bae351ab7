export { createConsoleHandle, type ConsoleHandle, type ConsoleHandleOptions } from "./console.js";
export { createRecordingHandle, type RecordingHandle, type RecordedFailure } from "./recording.js";
