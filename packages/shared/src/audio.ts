/**
 * Audio file formats recognized by the catalog.
 */

/** Extensions (lower-case, no dot) that the folder sync picks up */
export const AUDIO_EXTENSIONS = ["mp3", "wav", "m4a", "flac", "ogg"] as const;

export type AudioExtension = (typeof AUDIO_EXTENSIONS)[number];

/** Content-Type served for each recognized extension */
export const AUDIO_MIME_TYPES: Record<AudioExtension, string> = {
  mp3: "audio/mpeg",
  wav: "audio/wav",
  m4a: "audio/mp4",
  flac: "audio/flac",
  ogg: "audio/ogg",
};

/** Fallback when the extension is not recognized */
export const DEFAULT_AUDIO_MIME_TYPE = "audio/mpeg";

/** Check if a lower-cased extension is a recognized audio extension */
export function isAudioExtension(ext: string): ext is AudioExtension {
  return AUDIO_EXTENSIONS.includes(ext as AudioExtension);
}

/**
 * Split a file name into its base name and extension.
 * The extension keeps its original case and has no leading dot.
 * Dotfiles such as ".mp3" have no extension.
 */
export function splitExtension(fileName: string): { base: string; ext: string } {
  const dot = fileName.lastIndexOf(".");
  if (dot <= 0) {
    return { base: fileName, ext: "" };
  }
  return { base: fileName.slice(0, dot), ext: fileName.slice(dot + 1) };
}

/** Infer the Content-Type for a file name from its extension */
export function audioMimeTypeFor(fileName: string): string {
  const ext = splitExtension(fileName).ext.toLowerCase();
  return isAudioExtension(ext) ? AUDIO_MIME_TYPES[ext] : DEFAULT_AUDIO_MIME_TYPE;
}
