// Simulated weather lookup; no network involved.

export interface Weather {
  temp: string;
  condition: string;
  humidity: string;
}

const WEATHER: Record<string, Weather> = {
  'San Francisco': { temp: '68°F', condition: 'Foggy', humidity: '85%' },
  'New York': { temp: '75°F', condition: 'Sunny', humidity: '60%' },
  London: { temp: '62°F', condition: 'Rainy', humidity: '90%' },
};

export const FALLBACK_WEATHER: Weather = { temp: '72°F', condition: 'Unknown', humidity: '70%' };

// Exact, case-sensitive city match
export function lookupWeather(city: string): Weather {
  return Object.prototype.hasOwnProperty.call(WEATHER, city) ? WEATHER[city] : FALLBACK_WEATHER;
}

export function renderWeather(city: string, w: Weather = lookupWeather(city)): string {
  return `Weather in ${city}:\n🌡️ Temperature: ${w.temp}\n🌤️ Condition: ${w.condition}\n💧 Humidity: ${w.humidity}`;
}
