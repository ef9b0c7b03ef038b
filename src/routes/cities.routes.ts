import { NextFunction, Request, Response, Router } from 'express';
import { matchedData } from 'express-validator';
import multer, { FileFilterCallback } from 'multer';
import path from 'path';
import { getCity, listCities } from '../config/cities';
import { CsvImportService, ManualPoiInput } from '../services/csv-import.service';
import { LayerStore } from '../services/layer-store.service';
import { ValidationError } from '../utils/errors';
import { handleValidation, manualPoiValidation } from '../utils/validation';

export interface CitiesRouterDeps {
  csvImport: CsvImportService;
  store: LayerStore;
  uploadDir: string;
}

const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

function csvOnly(_req: Request, file: Express.Multer.File, cb: FileFilterCallback): void {
  const isCsv = path.extname(file.originalname).toLowerCase() === '.csv' || file.mimetype === 'text/csv';
  if (isCsv) {
    cb(null, true);
  } else {
    cb(new ValidationError('Only CSV files are accepted'));
  }
}

/**
 * 404 for unknown cities before any upload is written to disk.
 */
function requireCity(req: Request, _res: Response, next: NextFunction): void {
  try {
    getCity(req.params.city);
    next();
  } catch (error) {
    next(error);
  }
}

export function createCitiesRouter({ csvImport, store, uploadDir }: CitiesRouterDeps): Router {
  const router = Router();
  const upload = multer({ dest: uploadDir, limits: { fileSize: MAX_UPLOAD_BYTES }, fileFilter: csvOnly });

  router.get('/', (req: Request, res: Response) => {
    const country = typeof req.query.country === 'string' ? req.query.country : undefined;
    const cities = listCities(country);
    return res.json({ success: true, count: cities.length, data: cities });
  });

  router.get('/:city', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const city = getCity(req.params.city);
      const [silverMetadata, destination, manual, csv] = await Promise.all([
        store.readSilverMetadata(city.key),
        store.readDestination(city.key),
        store.readManualPois(city.key, 'manual'),
        store.readManualPois(city.key, 'csv'),
      ]);
      return res.json({
        success: true,
        data: { ...city, silverMetadata, destination, manualPois: manual.length, csvPois: csv.length },
      });
    } catch (error) {
      return next(error);
    }
  });

  router.post(
    '/:city/manual-pois',
    manualPoiValidation,
    handleValidation,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const city = getCity(req.params.city);
        const data = matchedData(req);
        const input: ManualPoiInput = {
          name: String(data.name),
          category: typeof data.category === 'string' ? data.category : 'attraction',
          lat: Number(data.lat),
          lon: Number(data.lon),
          description: typeof data.description === 'string' ? data.description : undefined,
        };
        const poi = await csvImport.addManualPoi(city.key, input);
        return res.status(201).json({ success: true, data: poi });
      } catch (error) {
        return next(error);
      }
    }
  );

  router.post('/:city/csv', requireCity, upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const city = getCity(req.params.city);
      if (!req.file) {
        return res.status(400).json({ success: false, error: 'A CSV file is required in the "file" field' });
      }
      const report = await csvImport.importFile(req.file.path, city.key, { removeAfterImport: true });
      return res.json({ success: true, data: { ...report, file: req.file.originalname } });
    } catch (error) {
      return next(error);
    }
  });

  return router;
}

export default createCitiesRouter;
