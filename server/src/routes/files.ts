import { Hono } from 'hono';
import { ValidationError } from '../lib/errors';
import type { FileLookup } from '../lib/files/identity';
import { toFileRecordResponse } from '../lib/files/types';
import type { AppDependencies } from '../lib/dependencies';
import { optionalText, readForm, requiredText } from './request-body';

type UploadOutcome = 'success' | 'partial' | 'failed';

function uploadOutcome(uploaded: number, rejected: number): UploadOutcome {
  if (rejected === 0) {
    return 'success';
  }
  return uploaded > 0 ? 'partial' : 'failed';
}

export function createFileRoutes({ uploads, tracker, knowledgeBases }: AppDependencies) {
  const routes = new Hono();

  function lookupFrom(key: string, knowledgeBase: string | undefined): FileLookup {
    return knowledgeBase === undefined ? { key } : { key, knowledgeBase };
  }

  routes.get('/files', async (c) => {
    const knowledgeBase = optionalText(c.req.query('knowledge_base'));
    const records = await uploads.list(knowledgeBase);
    return c.json({ files: records.map(toFileRecordResponse) });
  });

  routes.post('/upload', async (c) => {
    const formData = await readForm(c);
    const knowledgeBase = requiredText(formData.get('knowledge_base'), 'knowledge_base');

    if (!(await knowledgeBases.exists(knowledgeBase))) {
      throw new ValidationError(`Knowledge base '${knowledgeBase}' does not exist; create it first`, {
        knowledge_base: knowledgeBase,
      });
    }

    const singleFileEntry = formData.get('file');
    const candidateEntries = singleFileEntry
      ? [...formData.getAll('files'), singleFileEntry]
      : formData.getAll('files');

    const files: File[] = [];
    for (const entry of candidateEntries) {
      if (typeof entry !== 'string') {
        files.push(entry);
      }
    }

    if (files.length === 0) {
      throw new ValidationError('No files were provided. Use "files" multipart fields.', {
        allowed_extensions: uploads.getAllowedExtensions(),
      });
    }

    console.log(`[upload] request kb="${knowledgeBase}" files=${files.length}`);
    const result = await uploads.upload(knowledgeBase, files);

    return c.json({
      status: uploadOutcome(result.uploadedFiles.length, result.rejectedFiles.length),
      uploaded_files: result.uploadedFiles.length,
      files: result.uploadedFiles.map(toFileRecordResponse),
      rejected_files: result.rejectedFiles.map((rejected) => ({
        filename: rejected.originalName,
        reason: rejected.reason,
      })),
      allowed_extensions: uploads.getAllowedExtensions(),
    });
  });

  routes.post('/parse', async (c) => {
    const formData = await readForm(c);
    const filename = requiredText(formData.get('filename'), 'filename');
    const knowledgeBase = optionalText(formData.get('knowledge_base'));

    const { started, record } = await tracker.start(lookupFrom(filename, knowledgeBase));

    return c.json({
      status: 'success',
      message: started
        ? `Parsing started for ${record.originalName}`
        : `File ${record.originalName} is already being processed`,
      started,
      file: toFileRecordResponse(record),
    });
  });

  routes.get('/files/:fileKey/status', async (c) => {
    const lookup = lookupFrom(c.req.param('fileKey'), optionalText(c.req.query('knowledge_base')));
    const record = await tracker.status(lookup);
    return c.json(toFileRecordResponse(record));
  });

  routes.post('/files/:fileKey/reset', async (c) => {
    const lookup = lookupFrom(c.req.param('fileKey'), optionalText(c.req.query('knowledge_base')));
    const record = await tracker.reset(lookup);

    return c.json({
      status: 'success',
      message: `File ${record.originalName} status reset`,
      file: toFileRecordResponse(record),
    });
  });

  routes.delete('/files/:fileKey', async (c) => {
    const lookup = lookupFrom(c.req.param('fileKey'), optionalText(c.req.query('knowledge_base')));
    const removed = await uploads.delete(lookup);
    tracker.cancel(removed.safeKey, 'file deleted');

    return c.json({
      status: 'success',
      message: `File ${removed.originalName} deleted`,
      deleted_file: removed.originalName,
    });
  });

  return routes;
}
