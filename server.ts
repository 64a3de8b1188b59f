import express, { Express, NextFunction, Request, Response } from 'express';
import multer, { FileFilterCallback } from 'multer';
import cors from 'cors';
import dotenv from 'dotenv';
import { db } from './services/DatabaseService';
import { AssessmentPipeline, DeclarationDocument } from './services/AssessmentPipeline';
import { ComplianceExtractionService } from './services/ComplianceExtractionService';
import { EmbeddingService } from './services/EmbeddingService';
import { IndexingService } from './services/IndexingService';
import { LanguageModelService } from './services/LanguageModelService';
import { MentionAssessmentService } from './services/MentionAssessmentService';
import { PineconeService } from './services/PineconeService';
import { RetrievalService } from './services/RetrievalService';
import { TextExtractionService } from './services/TextExtractionService';
import { MaterialRecord, MaterialRecordStore, PipelineConfig, TextExtractor } from './types';
import { loadPipelineConfig } from './utils/pipelineConfig';

dotenv.config();

export interface AppServices {
  config: PipelineConfig;
  store: MaterialRecordStore;
  textExtractor: TextExtractor;
  // null when the model or vector-store keys are missing
  indexingService: IndexingService | null;
  pipeline: AssessmentPipeline | null;
}

const ALLOWED_MIMES = [
  'application/pdf',
  'text/plain',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document'
];

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 10 * 1024 * 1024
  },
  fileFilter: (_req: Request, file: Express.Multer.File, cb: FileFilterCallback) => {
    const name = file.originalname.toLowerCase();
    if (ALLOWED_MIMES.includes(file.mimetype) || name.endsWith('.txt') || name.endsWith('.pdf') || name.endsWith('.docx')) {
      cb(null, true);
    } else {
      cb(new Error('Invalid file type. Only PDF, DOCX and text files are allowed.'));
    }
  }
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/** "A, B,,C" -> ["A", "B", "C"]; arrays of strings are accepted as well. */
export function parseIdList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items
    .filter((item): item is string => typeof item === 'string')
    .flatMap(item => item.split(','))
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function parseMetadata(value: unknown): Record<string, string> {
  if (typeof value !== 'string' || !value.trim()) {
    return {};
  }
  const parsed: unknown = JSON.parse(value);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('metadata must be a JSON object');
  }
  const metadata: Record<string, string> = {};
  for (const [key, entry] of Object.entries(parsed)) {
    if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') {
      metadata[key] = String(entry);
    }
  }
  return metadata;
}

function uploadedFiles(req: Request): Express.Multer.File[] {
  if (Array.isArray(req.files)) {
    return req.files;
  }
  return req.file ? [req.file] : [];
}

function withUpload(handler: express.RequestHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res, (err?: unknown) => {
      if (err) {
        res.status(400).json({
          error: 'Upload error',
          message: errorMessage(err)
        });
        return;
      }
      next();
    });
  };
}

export function summarizeRecords(records: MaterialRecord[]) {
  const rows = records.map(record => ({
    materialId: record.materialId,
    supplierName: record.supplierName,
    complianceFlag: record.complianceFlag,
    restrictedSubstances: record.restrictedSubstances,
    mentionKeywords: [...new Set(record.regulatoryMentions.map(mention => mention.keyword).filter(Boolean))],
    sourcePath: record.sourcePath,
    updatedAt: record.updatedAt
  }));

  return {
    total: records.length,
    compliant: records.filter(record => record.complianceFlag === true).length,
    nonCompliant: records.filter(record => record.complianceFlag === false).length,
    undetermined: records.filter(record => record.complianceFlag === null).length,
    records: rows
  };
}

export function createApp(services: AppServices): Express {
  const app = express();

  const allowedOrigins = (process.env.CORS_ORIGINS || '')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

  app.use(cors({
    origin: (origin, callback) => {
      // Requests without an origin (curl, server-to-server)
      if (!origin) return callback(null, true);

      const isLocal = /^http:\/\/localhost(:\d+)?$/.test(origin);
      if (isLocal || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.post('/api/declarations/index', withUpload(upload.single('file')), async (req: Request, res: Response) => {
    try {
      if (!services.indexingService) {
        return res.status(503).json({
          error: 'Indexing not available',
          message: 'GEMINI_API_KEY and PINECONE_API_KEY must be set'
        });
      }

      const file = req.file;
      const materialId = typeof req.body.materialId === 'string' ? req.body.materialId.trim() : '';
      if (!file || !materialId) {
        console.warn(`[Server] Index request rejected: file and materialId are required`);
        return res.status(400).json({
          error: 'Missing input',
          message: 'Please provide a file and a materialId'
        });
      }

      let metadata: Record<string, string>;
      try {
        metadata = parseMetadata(req.body.metadata);
      } catch (error) {
        return res.status(400).json({ error: 'Invalid metadata', message: errorMessage(error) });
      }

      const { text } = await services.textExtractor.extractText(file.buffer, file.mimetype, file.originalname);
      const result = await services.indexingService.indexDeclaration(
        {
          text,
          materialId,
          sourceDocumentId: file.originalname,
          sku: typeof req.body.sku === 'string' ? req.body.sku : undefined,
          metadata
        },
        services.config
      );

      return res.json({ success: true, ...result });
    } catch (error) {
      console.error(`[Server] ERROR: Indexing failed:`, error);
      return res.status(500).json({
        error: 'Indexing failed',
        message: errorMessage(error)
      });
    }
  });

  app.post('/api/assess', withUpload(upload.array('files')), async (req: Request, res: Response) => {
    try {
      if (!services.pipeline) {
        return res.status(503).json({
          error: 'Assessment not available',
          message: 'GEMINI_API_KEY and PINECONE_API_KEY must be set'
        });
      }

      const files = uploadedFiles(req);
      const bomMaterialIds = parseIdList(req.body.bomMaterialIds);
      if (files.length === 0 || bomMaterialIds.length === 0) {
        console.warn(`[Server] Assess request rejected: files and bomMaterialIds are required`);
        return res.status(400).json({
          error: 'Missing input',
          message: 'Please provide files and bomMaterialIds'
        });
      }

      // Hints are aligned with the files by position
      const hints = typeof req.body.materialIds === 'string' ? req.body.materialIds.split(',') : [];
      const documents: DeclarationDocument[] = files.map((file, index) => ({
        file: file.originalname,
        buffer: file.buffer,
        mimetype: file.mimetype,
        materialIdHint: hints[index]?.trim() || undefined
      }));

      const result = await services.pipeline.assessDocuments(bomMaterialIds, documents);
      return res.json({ success: true, ...result });
    } catch (error) {
      console.error(`[Server] ERROR: Assessment failed:`, error);
      return res.status(500).json({
        error: 'Assessment failed',
        message: errorMessage(error)
      });
    }
  });

  app.post('/api/assess/indexed', async (req: Request, res: Response) => {
    try {
      if (!services.pipeline) {
        return res.status(503).json({
          error: 'Assessment not available',
          message: 'GEMINI_API_KEY and PINECONE_API_KEY must be set'
        });
      }

      const bomMaterialIds = parseIdList(req.body?.bomMaterialIds);
      if (bomMaterialIds.length === 0) {
        return res.status(400).json({
          error: 'Missing input',
          message: 'Please provide bomMaterialIds'
        });
      }

      const result = await services.pipeline.assessIndexedMaterials(bomMaterialIds);
      return res.json({ success: true, ...result });
    } catch (error) {
      console.error(`[Server] ERROR: Indexed assessment failed:`, error);
      return res.status(500).json({
        error: 'Assessment failed',
        message: errorMessage(error)
      });
    }
  });

  app.get('/api/material-records', async (req: Request, res: Response) => {
    try {
      const materialId = typeof req.query.materialId === 'string' ? req.query.materialId.trim() : '';
      const records = await services.store.list(materialId || undefined);
      return res.json({ success: true, records });
    } catch (error) {
      console.error(`[Server] ERROR: Failed to list material records:`, error);
      return res.status(500).json({
        error: 'Failed to list material records',
        message: errorMessage(error)
      });
    }
  });

  app.get('/api/evaluation/summary', async (_req: Request, res: Response) => {
    try {
      const records = await services.store.list();
      return res.json({ success: true, ...summarizeRecords(records) });
    } catch (error) {
      console.error(`[Server] ERROR: Failed to build evaluation summary:`, error);
      return res.status(500).json({
        error: 'Failed to build evaluation summary',
        message: errorMessage(error)
      });
    }
  });

  return app;
}

function buildServices(): AppServices {
  const config = loadPipelineConfig();
  const geminiApiKey = process.env.GEMINI_API_KEY;
  const pineconeApiKey = process.env.PINECONE_API_KEY;
  const embeddingDimension = parseInt(process.env.EMBEDDING_DIMENSION || '768', 10);
  const textExtractor = new TextExtractionService();

  if (!geminiApiKey) {
    console.error('[Server] WARNING: GEMINI_API_KEY environment variable is not set');
  }
  if (!pineconeApiKey) {
    console.error('[Server] WARNING: PINECONE_API_KEY environment variable is not set');
  }
  if (!geminiApiKey || !pineconeApiKey) {
    return { config, store: db, textExtractor, indexingService: null, pipeline: null };
  }

  const embeddingService = new EmbeddingService(geminiApiKey, embeddingDimension, process.env.EMBEDDING_MODEL || undefined);
  const vectorStore = new PineconeService(pineconeApiKey, config.collectionName, embeddingDimension);
  const languageModel = new LanguageModelService(geminiApiKey, process.env.LLM_MODEL || undefined);
  const indexingService = new IndexingService(embeddingService, vectorStore);

  const pipeline = new AssessmentPipeline(
    {
      textExtractor,
      indexingService,
      extractionService: new ComplianceExtractionService(new RetrievalService(embeddingService, vectorStore), languageModel),
      mentionAssessment: new MentionAssessmentService(languageModel),
      vectorStore,
      store: db
    },
    config
  );

  return { config, store: db, textExtractor, indexingService, pipeline };
}

if (require.main === module) {
  const PORT = process.env.PORT || 5003;
  const app = createApp(buildServices());

  // Connect in the background; requests retry the connection
  db.connect().catch(err => {
    console.error('[Server] Database connection failed:', err);
  });

  const server = app.listen(PORT, () => {
    console.log(`[Server] Server started on port ${PORT}`);
    console.log(`[Server] Health check available at http://localhost:${PORT}/health`);
  });

  const shutdown = () => {
    server.close(() => {
      db.disconnect()
        .catch(err => console.error('[Server] Database disconnect failed:', err))
        .finally(() => process.exit(0));
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}
