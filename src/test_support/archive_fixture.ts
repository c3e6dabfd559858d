import AdmZip from "adm-zip";

export const FIXTURE_VERSION = "20250301";

const uno = (...fields: string[]) => fields.join("<,>");

// Four stations on one line, served in both directions, plus a walking
// connector that has no timing table.
export const sampleTables = (): Record<string, string> => ({
    uno: [
        uno("XXS001", "MS", "Alpha", "阿尔法", "阿爾法", "アルファ", "ALP", "A", "39.9000", "116.4000", "10", "20"),
        uno("XXML01", "ML", "Line 1", "1号线", "1號線", "1号線", "", "1", "", "", "", "", "#C23A30"),
        uno("XXS002", "MS", "Bravo", "布拉沃", "布拉沃", "ブラボー", "BRA", "B", "39.9100", "116.4100", "30", "40"),
        uno("XXS003", "MS", "Charlie", "查理", "查理", "チャーリー", "CHA", "C", "39.9200", "116.4200", "50", "60"),
        uno("XXMW01A", "MW", "Line 1 to Delta", "1号线 往 德尔塔", "", "", "", "1A"),
        uno("XXS004", "MS", "Delta", "德尔塔", "德爾塔", "デルタ", "DEL", "D", "39.9300", "116.4300", "70", "80"),
        uno("XXMW01B", "MW", "Line 1 to Alpha", "1号线 往 阿尔法", "", "", "", "1B"),
        uno("XXWL01", "WL", "Transfer", "换乘", "換乘", "乗換", "", "T", "", "", "", "", "#888888"),
        uno("XXWW01", "WW", "Transfer walk", "换乘步行", "", "", "", "TW"),
        uno("XXZZ01", "ZZ", "ignored"),
    ].join("\r\n"),
    line: ["XXML01,0,1,2,3", "XXWL01,1,2"].join("\r\n"),
    way: ["XXMW01A,0,0,0,1,2,3", "XXMW01B,0,0,3,2,1,0", "XXWW01,1,0,1,2"].join("\r\n"),
    fare: ["F1,XXMW01A|XXMW01B,0,fare_matrix.csv,", "F2,XXWW01,2,,XXS002|XXS003"].join("\r\n"),
    fare_matrix: ["3,3,4,5", "3,3,3,4", "4,3,3,3", "5,4,3,3"].join("\r\n"),
    holiday: ["20250101", "20251001", ""].join("\r\n"),
    schedule: [
        uno("WD", "1", "1", "1", "1", "1", "0", "0", "0", "0"),
        uno("WE", "0", "0", "0", "0", "0", "1", "1", "0", "1"),
    ].join("\r\n"),
    wayschedule: ["XXMW01A,0,WD,WE", "XXMW01B,0,WD", "XXWW01,0,WD"].join("\r\n"),
    // Two schedules, split on decreasing departures.
    XXMW01A: [
        "360,363",
        "370,373",
        "363,366",
        "373,376",
        "366,369",
        "376,379",
        "300,303",
        "330,333",
        "303,306",
        "333,336",
        "306,309",
        "336,339",
    ].join("\r\n"),
    // One record per hop, hops ranked by departure station index.
    XXMW01B: ["406,409", "403,406", "400,403"].join("\r\n"),
    path_latlng: [
        "39.9000,116.4000",
        "39.9050,116.4050",
        "39.9100,116.4100",
        "39.9150,116.4150",
        "39.9200,116.4200",
        "39.9250,116.4250",
        "39.9300,116.4300",
    ].join("\r\n"),
    path_rail: ["XXML01,XXS001,XXS002,0,2", "XXML01,XXS002,XXS003,2,4", "XXML01,XXS003,XXS004,4,6"].join("\r\n"),
});

export function buildArchive(tables: Record<string, string>, version = FIXTURE_VERSION): Buffer {
    const zip = new AdmZip();
    for (const [name, text] of Object.entries(tables)) {
        zip.addFile(`${version}/${name}.csv`, Buffer.from(text, "utf8"));
    }
    return zip.toBuffer();
}

export const sampleArchive = () => buildArchive(sampleTables());
