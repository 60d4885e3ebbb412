export { handleGetLatestChart } from './getLatestChart';
export { handleGetChartByDate } from './getChartByDate';
export { handleListCharts } from './listCharts';
