import { FileManager } from '../utils/FileManager';
import { TokenQueue } from '../batch/TokenQueue';
import { TokenPipeline } from '../batch/TokenPipeline';
import { SheetSource } from '../batch/SheetSource';
import { AppConfig } from './config';

export interface AppContext {
  config: AppConfig;
  fileManager: FileManager;
  queue: TokenQueue;
  pipeline: TokenPipeline;
  sheetSource: SheetSource;
}
