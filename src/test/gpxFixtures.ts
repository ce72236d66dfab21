export type FixtureFix = {
    lat: number;
    lon: number;
    ele?: number;
    time?: string;
};

export const trkpt = ({ lat, lon, ele, time }: FixtureFix) =>
    `<trkpt lat="${lat}" lon="${lon}">` +
    (ele === undefined ? "" : `<ele>${ele}</ele>`) +
    (time === undefined ? "" : `<time>${time}</time>`) +
    `</trkpt>`;

/**
 * Minimal GPX 1.1 document; each inner array becomes one <trkseg>.
 */
export const gpxDocument = (segments: FixtureFix[][], name = "Test track") =>
    `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="motion-file-engine tests" xmlns="http://www.topografix.com/GPX/1/1">
  <wpt lat="63.1" lon="-174.1"><name>Trailhead</name></wpt>
  <trk>
    <name>${name}</name>
${segments.map((seg) => `    <trkseg>\n${seg.map((f) => `      ${trkpt(f)}`).join("\n")}\n    </trkseg>`).join("\n")}
  </trk>
</gpx>
`;
