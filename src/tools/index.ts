export { toolSuccess, toolError, toToolError } from './tool-output';
export type { ToolOutput, ToolStatus } from './tool-output';
export { validateImageLimits } from './image-limits';
export { resolveTemperature } from './temperature';
export type { TemperatureResolution } from './temperature';
export { formatModelListing, formatContextWindow, listModelsTool } from './list-models';
