// Lambda entry point. Configuration is read once per container, at cold start.

import { loadConfig } from './core/AugmenterConfig.ts';
import { MetricAugmenter } from './core/MetricAugmenter.ts';

export const handler = MetricAugmenter.fromConfig(loadConfig()).build().firehoseHandler();
