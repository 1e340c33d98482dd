export class SubtitleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SubtitleError";
  }
}

export class WhisperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WhisperError";
  }
}
