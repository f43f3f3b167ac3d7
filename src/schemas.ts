/**
 * 広告キャンペーン自動最適化エンジン - バリデーションスキーマ
 */

import { z } from "zod";

// =============================================================================
// 基本型のスキーマ
// =============================================================================

export const ExecutionModeSchema = z.enum(["APPLY", "SHADOW"]);

export const VariantTypeSchema = z.enum(["headline", "image", "cta"], {
  errorMap: () => ({ message: "variant_type must be one of: headline, image, cta" }),
});

/**
 * 数値IDと文字列IDの両方を受け付ける
 */
const EntityIdSchema = z
  .union([z.string().trim().min(1), z.number().int().positive()])
  .transform(String);

/**
 * 設定値（ドル建ての数値文字列）
 */
export const SettingValueSchema = z
  .string()
  .trim()
  .min(1)
  .pipe(z.coerce.number().finite().nonnegative());

// =============================================================================
// APIリクエストスキーマ
// =============================================================================

export const OptimizerRunRequestSchema = z.object({
  mode: ExecutionModeSchema.optional(),
});

export const CreateABTestRequestSchema = z.object({
  campaign_id: EntityIdSchema,
  original_ad_id: EntityIdSchema,
  variant_type: VariantTypeSchema,
  variant_value: z.string().trim().min(1, "variant_value is required"),
  test_name: z.string().trim().min(1).max(200).optional(),
});

export const ABTestResultsQuerySchema = z.object({
  testId: EntityIdSchema.optional(),
});

// =============================================================================
// 型エクスポート（zodから推論）
// =============================================================================

export type VariantTypeInput = z.infer<typeof VariantTypeSchema>;
export type OptimizerRunRequest = z.infer<typeof OptimizerRunRequestSchema>;
export type CreateABTestRequest = z.infer<typeof CreateABTestRequestSchema>;
export type ABTestResultsQuery = z.infer<typeof ABTestResultsQuerySchema>;

// =============================================================================
// バリデーション結果型
// =============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

// =============================================================================
// バリデーションヘルパー関数
// =============================================================================

function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.errors.map((err) =>
    err.path.length > 0 ? `${err.path.join(".")}: ${err.message}` : err.message
  );
  return { success: false, errors };
}

/**
 * 最適化実行リクエストをバリデーション
 */
export function validateOptimizerRunRequest(data: unknown): ValidationResult<OptimizerRunRequest> {
  return validate(OptimizerRunRequestSchema, data ?? {});
}

/**
 * A/Bテスト作成リクエストをバリデーション
 */
export function validateCreateABTestRequest(data: unknown): ValidationResult<CreateABTestRequest> {
  return validate(CreateABTestRequestSchema, data);
}

export function validateABTestResultsQuery(data: unknown): ValidationResult<ABTestResultsQuery> {
  return validate(ABTestResultsQuerySchema, data);
}
