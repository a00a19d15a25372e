/**
 * A logical isolation boundary. External networks are shared with sibling
 * systems and must exist before the stack starts; the rest belong to the
 * project and are created on demand.
 */
export interface NetworkDefinition {
  readonly name: string;
  readonly external: boolean;
}
