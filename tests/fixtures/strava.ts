export const morningRun = {
  id: 1001,
  name: "Morning Run",
  type: "Run",
  sport_type: "Run",
  start_date_local: "2024-12-29T07:15:00Z",
  moving_time: 1800,
  distance: 5012,
  average_heartrate: 142.5,
  max_heartrate: 171,
  calories: 410,
  average_watts: null,
  max_watts: null,
};

export const eveningRide = {
  id: 1002,
  name: "Evening Ride",
  type: null,
  sport_type: "Ride",
  start_date_local: "2024-12-30T18:05:30Z",
  moving_time: 3600,
  distance: 20250,
  average_heartrate: 128,
  max_heartrate: 160,
  average_watts: 180,
  max_watts: 420,
};

export const heartRateZones = [
  { type: "pace", distribution_buckets: [{ min: 0, max: 300, time: 1000 }] },
  {
    type: "heartrate",
    distribution_buckets: [
      { min: 0, max: 115, time: 600 },
      { min: 115, max: 135, time: 0 },
      { min: 135, max: 150, time: 1230 },
      { min: 150, max: 165, time: 90 },
      { min: 165, max: -1, time: 30 },
    ],
  },
];
