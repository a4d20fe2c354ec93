export type { SandboxBaseTool, SandboxToolOptions } from './BaseTool.js';
export { SandboxCommonSchemas, describeSandbox } from './BaseTool.js';
export { CreateSandboxTool } from './CreateSandboxTool.js';
export { SandboxInfoTool } from './SandboxInfoTool.js';
export { RunCodeTool } from './RunCodeTool.js';
export { ListDirectoryTool } from './ListDirectoryTool.js';
export { WriteFileTool } from './WriteFileTool.js';
export { RemoveEntryTool } from './RemoveEntryTool.js';
export { InstallPackagesTool } from './InstallPackagesTool.js';
export { DeleteSandboxTool } from './DeleteSandboxTool.js';
export { CancelTool } from './CancelTool.js';
export { HealthTool } from './HealthTool.js';
