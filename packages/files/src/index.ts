/**
 * @termdesk/files
 *
 * Open files and folders, read and save text, recent files, terminal editors.
 */

export * from "./core/model.js";
export { FileService, openerCommand, type FileServiceOptions } from "./core/FileService.js";

export { registerAllTools, type Services, type ToolRegistrar } from "./tools/index.js";
