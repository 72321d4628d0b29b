/** Common fields shared by all syntax tree nodes. */
export interface BaseNode {
  kind: string;
}
