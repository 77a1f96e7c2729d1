import Bull from 'bull';
import { config } from '../config';

// Housekeeping jobs (expired OAuth state sweep)
export const maintenanceQueue = new Bull('maintenance', config.redisUrl, {
  defaultJobOptions: {
    attempts: 3,
    backoff: {
      type: 'exponential',
      delay: 5000,
    },
    removeOnComplete: true,
    removeOnFail: false,
  },
});

// Queue event handlers
maintenanceQueue.on('completed', (job) => {
  console.log(`✓ Maintenance job ${job.id} completed successfully`);
});

maintenanceQueue.on('failed', (job, err) => {
  console.error(`✗ Maintenance job ${job?.id} failed:`, err.message);
});

maintenanceQueue.on('error', (error) => {
  console.error('Queue error:', error);
});

export default maintenanceQueue;
