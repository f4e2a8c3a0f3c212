import { readFile } from "node:fs/promises";
import path from "node:path";
import OpenAI from "openai";
import type { VisionAdapter } from "./types";

const MIME_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".webp": "image/webp",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
};

export function imageMimeType(imagePath: string): string {
  return MIME_TYPES[path.extname(imagePath).toLowerCase()] ?? "image/jpeg";
}

export function createOpenAIAdapter(options: {
  apiKey: string;
  baseURL?: string;
}): VisionAdapter {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    maxRetries: 0,
  });

  return {
    name: "openai",
    async extract({ imagePath, instruction, model, signal }) {
      const image = await readFile(imagePath);
      const url = `data:${imageMimeType(imagePath)};base64,${image.toString("base64")}`;
      const completion = await client.chat.completions.create(
        {
          model,
          temperature: 0,
          messages: [
            {
              role: "user",
              content: [
                { type: "text", text: instruction },
                { type: "image_url", image_url: { url } },
              ],
            },
          ],
        },
        { signal }
      );
      return completion.choices[0]?.message?.content?.trim() ?? "";
    },
  };
}
