import { IdType } from "./types"

export const missingTarget = (nodeId: IdType, targetId: IdType) =>
  `Missing Target: cannot add node '${nodeId}', target '${targetId}' is not in graph.`

export const missingEndpoint = (sourceId: IdType, targetId: IdType) =>
  `Missing Endpoint: cannot add edge '${sourceId}' => '${targetId}', both nodes must be in graph.`

export const missingRoot = (nodeId: IdType) =>
  `Missing Root: cannot render tree, node '${nodeId}' is not in graph.`

export const invalidSyntaxName = (name: string) =>
  `Invalid syntax name: '${name}'`

export const unexpectedBeforeBrace = (text: string) =>
  `Unexpected character(s) before opening bracket: '${text}'`

export const wrongFieldCount = (count: number) =>
  `Brackets must contain the 7 quoted syntax elements, found ${count}`

export const invalidStripFlag = (text: string) =>
  `Expected 'true' or 'false' as last syntax element, found '${text}'`

export const unterminatedField = (text: string) =>
  `Unterminated quoted syntax element: '${text}'`

export const unterminatedBrace = (text: string) =>
  `Missing closing bracket in syntax definition: '${text}'`

export const singleQuotesUnsupported = () =>
  `Single-quoted syntax elements are not supported, use double quotes`

export const unexpectedCharacter = (char: string, position: number) =>
  `Unexpected '${char}' at position ${position} in syntax string`
