import type { SearchIndexArtifact } from '@site-search/types';

/**
 * 成果物を正規形のJSONにシリアライズ
 * キー順を固定し、余分な空白を含めない（同じ入力から常に同じバイト列）
 */
export function serializeArtifact(artifact: SearchIndexArtifact): string {
  const canonical: SearchIndexArtifact = {
    config: {
      lang: [...artifact.config.lang],
      separator: artifact.config.separator,
      min_search_length: artifact.config.min_search_length,
      prebuild_index: artifact.config.prebuild_index,
    },
    docs: artifact.docs.map((doc) => ({
      location: doc.location,
      title: doc.title,
      text: doc.text,
    })),
  };
  return JSON.stringify(canonical);
}
