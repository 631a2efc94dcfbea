/**
 * Conversion option resolution
 * Layers config defaults, a named profile and CLI overrides
 */

import type { AppConfig, ConversionOptions, Profile } from "../types";
import { defaultConversionOptions } from "../types";

function applyProfile(options: ConversionOptions, profile: Profile): ConversionOptions {
  const next = { ...options };
  if (profile.imageQuality !== undefined) next.imageQuality = profile.imageQuality;
  if (profile.videoBitrate !== undefined) next.videoBitrate = profile.videoBitrate;
  if (profile.audioBitrate !== undefined) next.audioBitrate = profile.audioBitrate;
  if (profile.preset !== undefined) next.preset = profile.preset;
  if (profile.videoCodec !== undefined) next.videoCodec = profile.videoCodec;
  if (profile.audioCodec !== undefined) next.audioCodec = profile.audioCodec;
  if (profile.ffmpegPreference !== undefined) {
    next.ffmpegPreference = profile.ffmpegPreference;
  }
  return next;
}

/**
 * Build conversion options
 * Priority: overrides > profile > config defaults > built-in defaults
 *
 * @throws Error when the named profile is not in the config
 */
export function resolveOptions(
  config: AppConfig,
  profileName?: string,
  overrides: Profile = {},
): ConversionOptions {
  let options = applyProfile(defaultConversionOptions(), config.defaults);

  if (profileName !== undefined) {
    const profile = config.profiles[profileName];
    if (!profile) {
      throw new Error(`profile not found in config: ${profileName}`);
    }
    options = applyProfile(options, profile);
  }

  return applyProfile(options, overrides);
}
