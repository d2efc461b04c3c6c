export const SEPTA_API = {
  TRAINVIEW_URL: 'https://www3.septa.org/api/TrainView/index.php',
  NEXT_TO_ARRIVE_URL: 'https://www3.septa.org/api/NextToArrive/index.php',
};

// Stop list, schedules, advisories and route shapes are served by a separate
// reference data service; each dataset lives under its own path.
export const REFERENCE_API = {
  BASE_URL: 'http://localhost:8000',
  PATHS: {
    stops: '/stops',
    schedules: '/schedules',
    advisories: '/advisories',
    routeShapes: '/routes.geojson',
  },
} as const;
