import { BaseError } from "@keel/errors"

export type TrieErrorCode = "invalid_trie_value" | "invalid_trie_store_config"

export class TrieError extends BaseError<TrieErrorCode> {
  static invalidValue(input: { key: string; valueType: string; details: string }): TrieError {
    return new TrieError(
      `Value for key "${input.key}" is not a valid ${input.valueType}:\n${input.details}`,
      {
        code: "invalid_trie_value",
        context: { key: input.key, valueType: input.valueType },
        isOperational: false,
      },
    )
  }

  static invalidStoreConfig(input: { maxVersions: number }): TrieError {
    return new TrieError(
      `maxVersions must be a non-negative integer (got ${input.maxVersions})`,
      {
        code: "invalid_trie_store_config",
        context: { maxVersions: input.maxVersions },
      },
    )
  }
}
