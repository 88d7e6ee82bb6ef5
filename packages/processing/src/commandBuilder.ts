/**
 * FFmpeg Command Builder
 *
 * Fluent API for building image-sequence encode commands. Produces an
 * argument array; nothing is ever joined into a shell string.
 */

export interface SequenceInput {
  pattern: string;        // printf-style frame pattern
  startNumber: number;    // -start_number
  frameRate: number;      // -framerate (input rate)
  pixFmt?: string;        // -pix_fmt before -i
}

export interface OutputOptions {
  movflags?: string;      // -movflags for mp4
  frames?: number;        // -frames:v
  frameRate?: number;     // -r (output rate)
}

export interface VideoCodecOptions {
  codec: 'libx264';
  preset?: string;
  crf?: number;
  pixFmt?: string;
}

export interface EncoderInvocation {
  binary: string;
  args: string[];
  outputFile: string;
}

export class FFmpegCommandBuilder {
  private input: SequenceInput | null = null;
  private videoCodec: VideoCodecOptions | null = null;
  private videoFilters: string[] = [];
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];
  private mapMetadata: number | null = null;
  private overwriteOutput = false;

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Replace an existing output file (-y)
   */
  overwrite(): this {
    this.overwriteOutput = true;
    return this;
  }

  /**
   * Set the numbered image sequence to encode
   */
  addImageSequence(pattern: string, startNumber: number, frameRate: number, pixFmt?: string): this {
    this.input = { pattern, startNumber, frameRate, pixFmt };
    return this;
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = { ...options };
    return this;
  }

  /**
   * Add video filter. Empty expressions are ignored so no `-vf ""` is emitted.
   */
  addVideoFilter(filter: string): this {
    if (filter.length > 0) {
      this.videoFilters.push(filter);
    }
    return this;
  }

  /**
   * Copy metadata from input
   */
  copyMetadata(inputIndex: number = 0): this {
    this.mapMetadata = inputIndex;
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (!this.input) {
      throw new Error('Input sequence not specified');
    }
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }

    const args: string[] = [...this.globalArgs];
    if (this.overwriteOutput) {
      args.push('-y');
    }

    // Input
    args.push('-start_number', this.input.startNumber.toString());
    args.push('-framerate', this.input.frameRate.toString());
    if (this.input.pixFmt) {
      args.push('-pix_fmt', this.input.pixFmt);
    }
    args.push('-i', this.input.pattern);

    // Video codec
    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
      if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
      if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
    }

    if (this.videoFilters.length > 0) {
      args.push('-vf', this.videoFilters.join(','));
    }

    if (this.mapMetadata !== null) {
      args.push('-map_metadata', this.mapMetadata.toString());
    }

    // Output options
    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }
    if (this.outputOpts.frames !== undefined) {
      args.push('-frames:v', this.outputOpts.frames.toString());
    }
    if (this.outputOpts.frameRate !== undefined) {
      args.push('-r', this.outputOpts.frameRate.toString());
    }

    args.push(this.outputFile);
    return args;
  }

  /**
   * Build a structured invocation for the given binary
   */
  toInvocation(binary: string = 'ffmpeg'): EncoderInvocation {
    return { binary, args: this.build(), outputFile: this.outputFile };
  }
}
