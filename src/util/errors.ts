import { z } from "zod";

/**
 * Base class for errors that carry structured, schema-described data.
 *
 * Concrete errors are built with {@link NamedError.create}:
 *
 * ```typescript
 * export const NotFoundError = NamedError.create(
 *   "NotFoundError",
 *   z.object({ message: z.string() })
 * );
 *
 * throw new NotFoundError({ message: "Resource not found" });
 * ```
 */
export abstract class NamedError extends Error {
  abstract schema(): z.ZodTypeAny;
  abstract toObject(): { name: string; data: unknown };

  static create<Name extends string, Data extends z.ZodTypeAny>(name: Name, data: Data) {
    const schema = z.object({
      name: z.literal(name),
      data,
    });

    class Named extends NamedError {
      public static readonly Schema = schema;
      public override readonly name: Name = name;

      constructor(
        public readonly data: z.input<Data>,
        options?: ErrorOptions
      ) {
        super(name, options);
      }

      static isInstance(input: unknown): input is Named {
        return (
          typeof input === "object" &&
          input !== null &&
          "name" in input &&
          input.name === name
        );
      }

      schema() {
        return schema;
      }

      toObject() {
        return {
          name,
          data: this.data,
        };
      }
    }

    Object.defineProperty(Named, "name", { value: name });
    return Named;
  }
}
