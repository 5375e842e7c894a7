import { AppError } from "@typeforest/runtime-shared";
import {
  ErrorCode,
  type TypeDescriptor,
  type TypeEmitter,
} from "@typeforest/shared-types";

import { propertyKey } from "./identifiers";

export interface TypeScriptEmitterOptions {
  /** Type given to every field. Defaults to `string`. */
  fieldType?: string;
  /**
   * Parent names declared elsewhere, such as registry types. Any other
   * parent must be emitted earlier in the same sequence.
   */
  externalTypes?: Iterable<string>;
  /** Emit an empty interface for each referenced marker. Defaults to true. */
  declareMarkers?: boolean;
  /** Comment lines placed above the declarations. */
  header?: string[];
}

/**
 * Renders descriptors as TypeScript interface declarations, one per type,
 * each extending its parent or the capability marker.
 */
export class TypeScriptEmitter implements TypeEmitter<string> {
  private readonly fieldType: string;
  private readonly externalTypes: ReadonlySet<string>;
  private readonly declareMarkers: boolean;
  private readonly header: string[];

  constructor(options: TypeScriptEmitterOptions = {}) {
    this.fieldType = options.fieldType ?? "string";
    this.externalTypes = new Set(options.externalTypes ?? []);
    this.declareMarkers = options.declareMarkers ?? true;
    this.header = options.header ?? [];
  }

  /**
   * @throws AppError EMIT_FAILED when a parent type is neither external nor
   *   emitted before its child, or when a name repeats
   */
  emit(descriptors: readonly TypeDescriptor[]): string {
    const emitted = new Set<string>();
    const markers: string[] = [];
    const blocks: string[] = [];

    for (const descriptor of descriptors) {
      const { parent } = descriptor;
      if (emitted.has(descriptor.name)) {
        throw new AppError(ErrorCode.EMIT_FAILED, undefined, {
          operation: "emitTypeScript",
          typeName: descriptor.name,
          violations: ["type name emitted twice"],
        });
      }
      if (
        parent.kind === "type" &&
        !emitted.has(parent.name) &&
        !this.externalTypes.has(parent.name)
      ) {
        throw new AppError(ErrorCode.EMIT_FAILED, undefined, {
          operation: "emitTypeScript",
          typeName: descriptor.name,
          parentName: parent.name,
        });
      }
      if (parent.kind === "marker" && !markers.includes(parent.name)) {
        markers.push(parent.name);
      }

      blocks.push(this.renderInterface(descriptor));
      emitted.add(descriptor.name);
    }

    const sections = [
      ...(this.header.length > 0
        ? [this.header.map((line) => `// ${line}`).join("\n")]
        : []),
      ...(this.declareMarkers
        ? markers.map((marker) => `export interface ${marker} {}`)
        : []),
      ...blocks,
    ];
    return sections.length > 0 ? `${sections.join("\n\n")}\n` : "";
  }

  private renderInterface(descriptor: TypeDescriptor): string {
    const head = `export interface ${descriptor.name} extends ${descriptor.parent.name}`;
    if (descriptor.ownFields.length === 0) {
      return `${head} {}`;
    }
    const members = descriptor.ownFields.map(
      (field) => `  ${propertyKey(field)}: ${this.fieldType};`,
    );
    return [`${head} {`, ...members, "}"].join("\n");
  }
}
