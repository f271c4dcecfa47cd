/**
 * コア境界のエラー型
 * 検証・記録の結果は戻り値で返す。ここにあるのは呼び出し側の誤りと致命的なストレージ障害のみ
 */

export class MalformedTokenError extends Error {
  constructor(readonly token: string, reason: string) {
    super(`malformed token: ${reason}`);
    this.name = 'MalformedTokenError';
  }
}

export class InvalidSessionNameError extends Error {
  constructor(readonly sessionName: string, reason: string) {
    super(`invalid session name: ${reason}`);
    this.name = 'InvalidSessionNameError';
  }
}

/** insert 時にキーが既に存在する（一意制約違反） */
export class UniqueConstraintError extends Error {
  constructor(readonly key: string) {
    super(`unique constraint violated: ${key}`);
    this.name = 'UniqueConstraintError';
  }
}

/** 接続断・制約エンジンの想定外エラー等。コアではリトライしない */
export class StorageFailureError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageFailureError';
  }
}
