import fs from 'fs';

export class FileSystem {
    public static loadJson(path: string): Promise<unknown> {
        return new Promise((resolve, reject) => {
            const readStream = fs.createReadStream(path, { autoClose: true, encoding: 'utf-8' });

            let result = '';

            readStream.on('error', (e) => {
                reject(e);
            });

            readStream.on('data', (chunk) => {
                result += chunk.toString();
            });

            readStream.on('end', () => {
                try {
                    resolve(JSON.parse(result));
                } catch (e) {
                    reject(e);
                }
            });
        });
    }

    public static isFile(path: string): Promise<boolean> {
        return new Promise((resolve) => {
            fs.stat(path, (err, stat) => {
                resolve(!err && stat.isFile());
            });
        });
    }

    public static isDirectory(path: string): boolean {
        try {
            return fs.statSync(path).isDirectory();
        } catch {
            return false;
        }
    }
}
