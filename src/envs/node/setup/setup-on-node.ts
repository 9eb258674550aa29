import { createSha256, type ISha256 } from "../../../core/sha256.js";
import type { ILogger } from "../../../shared/logger.js";
import getLogger from "./_get-logger.js";

/**
 * `setupOnNode` のオプションです。
 */
export type SetupOnNodeOptions = {
  /**
   * ロガーです。指定されない場合は環境変数に応じて `ConsoleLogger` を使用します。
   */
  readonly logger?: ILogger | undefined;
};

/**
 * Node.js 環境向けに、ロガーを設定した SHA-256 のユーティリティーオブジェクトを作成します。
 * `DEBUG` などの環境変数が `1` または `true` の場合はデバッグログも出力します。
 *
 * @param options オプションです。
 * @returns SHA-256 のユーティリティーオブジェクトです。
 */
export default function setupOnNode(options: SetupOnNodeOptions | undefined = {}): ISha256 {
  const {
    logger,
  } = options;

  return createSha256({
    logger: getLogger(logger),
  });
}
