import { type ParseResult, type Rule, type Schema, number, string } from "@vitrine/core";

export const trim = (value: string) => value.trim();

export const title = (minLength: number, subject: string): Schema<string> =>
  string({
    minLength,
    maxLength: 155,
    transform: trim,
    messages: {
      type: `${subject} title must be text`,
      minLength: `${subject} title must contain at least ${minLength} characters`,
      maxLength: `${subject} title must contain at most 155 characters`,
    },
  });

export const description = (subject: string): Schema<string> =>
  string({
    minLength: 10,
    transform: trim,
    messages: {
      type: `${subject} description must be text`,
      minLength: `${subject} description must contain at least 10 characters`,
    },
  });

/** Primary key of a referenced row; form posts send it as text. */
export const identifier = (subject: string): Schema<number> =>
  number({
    coerce: true,
    integer: true,
    min: 1,
    messages: {
      type: `${subject} must be a valid id`,
      min: `${subject} must be a valid id`,
    },
  });

/** An uploaded image as the catalog services receive it. */
export interface ImageFile {
  originalName: string;
  mimeType: string;
  buffer: Buffer;
}

export const isImageFile = (value: unknown): value is ImageFile =>
  typeof value === "object" &&
  value !== null &&
  "originalName" in value &&
  typeof value.originalName === "string" &&
  "mimeType" in value &&
  typeof value.mimeType === "string" &&
  "buffer" in value &&
  Buffer.isBuffer(value.buffer);

const invalidImage = (path: string, file: ImageFile): ParseResult<never> => ({
  success: false,
  issues: [
    {
      path,
      message: `Upload a valid image. "${file.originalName}" is not an image.`,
      code: "invalid",
    },
  ],
});

/** Zero or more uploads, each with an `image/*` media type. */
export const images: Rule<ImageFile[]> = {
  check: (value, field) => {
    const files: unknown[] = value === undefined || value === null ? [] : Array.isArray(value) ? value : [value];
    const accepted: ImageFile[] = [];
    for (const file of files) {
      if (!isImageFile(file)) {
        return { success: false, issues: [{ path: field, message: "Expected uploaded files", code: "invalid" }] };
      }
      if (!file.mimeType.startsWith("image/")) {
        return invalidImage(field, file);
      }
      accepted.push(file);
    }
    return { success: true, data: accepted };
  },
};

/** A single optional image; `null` when none was given. */
export const optionalImage: Rule<ImageFile | null> = {
  check: (value, field) => {
    if (value === undefined || value === null) {
      return { success: true, data: null };
    }
    if (!isImageFile(value)) {
      return { success: false, issues: [{ path: field, message: "Expected an uploaded file", code: "invalid" }] };
    }
    return value.mimeType.startsWith("image/") ? { success: true, data: value } : invalidImage(field, value);
  },
};
