import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

/**
 * libx264 speed presets accepted by `-preset`
 */
export const X264PresetSchema = z.enum([
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow',
]);

export type X264Preset = z.infer<typeof X264PresetSchema>;

/**
 * ffmpeg bitrate such as `128k` or `2M`
 */
export const BitrateSchema = z.string().regex(/^\d+(\.\d+)?[kKmM]?$/, 'Expected a bitrate such as 128k or 2M');

/**
 * Zod schema for a `compress-video` preset
 */
const VideoPresetSchema = z.object({
  description: z.string(),
  crf: z.number().int().min(0).max(51).optional(),
  videoBitrate: BitrateSchema.optional(),
  audioBitrate: BitrateSchema,
  height: z.number().int().positive(),
  faststart: z.boolean().default(false),
  profile: z.string().optional(),
  level: z.string().optional(),
});

export type VideoPreset = z.infer<typeof VideoPresetSchema>;

export const DEFAULT_VIDEO_PRESETS: Record<string, z.input<typeof VideoPresetSchema>> = {
  web: { description: 'Optimize for web (good balance of quality and size)', crf: 23, audioBitrate: '128k', height: 720, faststart: true },
  fast: { description: 'Fast compression (lower quality, smaller size)', crf: 28, audioBitrate: '96k', height: 480 },
  hq: { description: 'High quality (better quality, larger size)', crf: 18, audioBitrate: '192k', height: 1080, faststart: true },
  mobile: {
    description: 'Optimize for mobile devices',
    crf: 23,
    audioBitrate: '128k',
    height: 480,
    faststart: true,
    profile: 'baseline',
    level: '3.0',
  },
  custom: { description: 'Custom compression (1080p, 2mbps)', videoBitrate: '2M', audioBitrate: '128k', height: 1080, faststart: true },
};

const RenditionSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

/**
 * Zod schema for the media configuration
 */
export const MediaConfigSchema = z.object({
  tools: z.object({
    installHints: z.record(z.string()).default({}),
  }).default({}),
  compressVideo: z.object({
    presets: z.record(VideoPresetSchema).default(DEFAULT_VIDEO_PRESETS),
  }).default({}),
  cropVideo: z.object({
    inputDir: z.string().default('./input'),
    outputDir: z.string().default('./output'),
    extensions: z.array(z.string()).default(['mp4', 'mov', 'mkv']),
    crf: z.number().int().min(0).max(51).default(23),
    preset: X264PresetSchema.default('slow'),
    audioBitrate: BitrateSchema.default('128k'),
    renditions: z.record(RenditionSchema).default({
      mobile: { width: 500, height: 700 },
      tablet: { width: 800, height: 700 },
    }),
    thumbnail: z.object({
      rendition: z.string().default('mobile'),
      atSeconds: z.number().nonnegative().default(1),
      quality: z.number().int().min(1).max(100).default(80),
    }).default({}),
  }).default({}),
  convertVideo: z.object({
    pattern: z.string().default('*.mov'),
    outputDir: z.string().default('converted'),
    preset: X264PresetSchema.default('medium'),
    crf: z.number().int().min(0).max(51).default(23),
    audioBitrate: BitrateSchema.default('192k'),
    concurrency: z.number().int().positive().default(1),
  }).default({}),
  compressImages: z.object({
    pattern: z.string().default('*.jpg'),
    outputDir: z.string().default('compressed'),
    quality: z.number().int().min(1).max(100).default(82),
    maxWidth: z.number().int().positive().default(1920),
    concurrency: z.number().int().positive().default(2),
  }).default({}),
  webp: z.object({
    pattern: z.string().default('*.jpg'),
    outputDir: z.string().default('webp'),
    quality: z.number().int().min(1).max(100).default(82),
    concurrency: z.number().int().positive().default(2),
  }).default({}),
  raw: z.object({
    quality: z.number().int().min(1).max(100).default(90),
    extensions: z.array(z.string()).default(['cr2']),
  }).default({}),
  heic: z.object({
    quality: z.number().int().min(1).max(100).optional(),
    extensions: z.array(z.string()).default(['heic']),
  }).default({}),
});

export type MediaConfig = z.infer<typeof MediaConfigSchema>;

const DEFAULT_CONFIG_NAME = 'media.config';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Configuration manager for loading and validating config files
 */
export class ConfigManager {
  private static configCache: Map<string, unknown> = new Map();

  /**
   * Resolve the path of a named config file (`config/<name>.json` under cwd)
   */
  static resolvePath(configName: string): string {
    if (configName === DEFAULT_CONFIG_NAME && process.env.MEDIA_CONFIG_PATH) {
      return path.resolve(process.env.MEDIA_CONFIG_PATH);
    }
    return path.join(process.cwd(), 'config', `${configName}.json`);
  }

  /**
   * Load and validate a configuration file.
   * A missing file yields the schema's defaults when `optional` is set.
   */
  static async load<T>(
    configName: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { optional?: boolean } = {}
  ): Promise<T> {
    const configPath = this.resolvePath(configName);
    const cacheKey = `${configName}:${configPath}`;

    const cached = this.configCache.get(cacheKey);
    if (cached !== undefined) {
      return schema.parse(cached);
    }

    let data: unknown;
    try {
      const content = await fs.readFile(configPath, 'utf-8');
      data = this.replaceEnvVars(JSON.parse(content));
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        if (!options.optional) {
          throw new Error(`Configuration file not found: ${configPath}`);
        }
        data = {};
      } else {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to load configuration ${configName}: ${message}`);
      }
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Configuration validation failed for ${configName}:\n${errors}`);
    }

    this.configCache.set(cacheKey, result.data);
    return result.data;
  }

  /**
   * Load the media configuration (defaults apply when the file is absent)
   */
  static async loadMediaConfig(): Promise<MediaConfig> {
    return this.load(DEFAULT_CONFIG_NAME, MediaConfigSchema, { optional: true });
  }

  /**
   * Clear configuration cache
   */
  static clearCache(): void {
    this.configCache.clear();
  }

  /**
   * Replace `${VAR_NAME}` placeholders with environment values
   */
  static replaceEnvVars(obj: unknown): unknown {
    if (typeof obj === 'string') {
      return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
        const value = process.env[varName];
        if (value === undefined) {
          throw new Error(`Environment variable ${varName} is not defined`);
        }
        return value;
      });
    }

    if (Array.isArray(obj)) {
      return obj.map((item) => this.replaceEnvVars(item));
    }

    if (obj !== null && typeof obj === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        result[key] = this.replaceEnvVars(value);
      }
      return result;
    }

    return obj;
  }
}
