/**
 * A durable storage claim. Created on first use and kept across container
 * recreation until removed explicitly.
 */
export interface NamedVolume {
  readonly name: string;
}

export type VolumeMount =
  | {
      readonly kind: "volume";
      // Logical name of a NamedVolume in the same manifest
      readonly source: string;
      readonly target: string;
    }
  | {
      readonly kind: "bind";
      // Host path, relative paths resolve against the project directory
      readonly source: string;
      readonly target: string;
      readonly readOnly?: boolean;
    };
