/**
 * Result Location Value Object
 * Time-limited download location of a completed task's output.
 */
export interface ResultLocationProps {
  downloadUrl: string;
  expiresIn: number;
}

export class ResultLocationVO {
  private readonly _downloadUrl: string;
  private readonly _expiresIn: number;

  private constructor(props: ResultLocationProps) {
    this._downloadUrl = props.downloadUrl;
    this._expiresIn = props.expiresIn;
  }

  static create(props: ResultLocationProps): ResultLocationVO {
    ResultLocationVO.validate(props);
    return new ResultLocationVO(props);
  }

  private static validate(props: ResultLocationProps): void {
    if (!props.downloadUrl || props.downloadUrl.trim().length === 0) {
      throw new Error('Download URL cannot be empty');
    }

    if (!Number.isFinite(props.expiresIn) || props.expiresIn < 0) {
      throw new Error('Expiry must be a non-negative number of seconds');
    }
  }

  get downloadUrl(): string {
    return this._downloadUrl;
  }

  /** Seconds until the download URL stops working */
  get expiresIn(): number {
    return this._expiresIn;
  }

  toJSON(): ResultLocationProps {
    return {
      downloadUrl: this._downloadUrl,
      expiresIn: this._expiresIn,
    };
  }
}
