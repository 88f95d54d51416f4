export {
  DEFAULT_SCRIPT_EXTENSION,
  compileAll,
  compileOne,
  compileSource,
  isDirectory,
  listScriptFiles,
} from "./compiler.js";
export type { CompileAllOptions, CompiledUnit } from "./compiler.js";
export { loadVocations, loadVocationsFile, parseXmlDocument } from "./xml.js";
export type { XmlDocument, XmlElementNode, XmlNode, XmlTextNode } from "./xml.js";
