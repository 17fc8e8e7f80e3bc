export const defaultConfig = {
  server: {
    port: 28888,
  },
  workDir: 'proxy_files',
  files: {
    serverConfig: 'server.toml',
    certificate: 'tuic-cert.pem',
    privateKey: 'tuic-key.pem',
    binary: 'tuic-server',
    credentials: 'tuic_user.txt',
  },
  logging: {
    level: 'info',
  },
  network: {
    timeoutMs: 5000,
    ipEchoUrls: ['https://api.ipify.org', 'https://icanhazip.com'],
    geoUrl: 'http://ip-api.com/line/{ip}?fields=countryCode',
    ipPlaceholder: 'YOUR_SERVER_IP',
    unknownCountry: 'XX',
  },
  relay: {
    downloadUrl: 'https://github.com/Itsusinn/tuic/releases/download/v1.3.5/tuic-server-x86_64-linux',
    downloadTimeoutMs: 120000,
  },
  certificate: {
    validityDays: 365,
  },
  link: {
    labelPrefix: 'TUIC-',
  },
  masqueradeDomains: [
    'www.microsoft.com',
    'www.cloudflare.com',
    'www.bing.com',
    'www.apple.com',
    'www.amazon.com',
    'www.wikipedia.org',
    'cdnjs.cloudflare.com',
    'cdn.jsdelivr.net',
    'static.cloudflareinsights.com',
    'www.speedtest.net',
  ],
} as const;
