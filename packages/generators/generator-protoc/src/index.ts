export { ProtocCodegen, buildProtocArgs } from "./protoc-codegen";
export type { ProtocCodegenOptions } from "./protoc-codegen";
