import type { ParsedJobDescription } from '../../src/types/jobDescription';
import { emptyResume, type ParsedResume } from '../../src/types/resume';

export function sampleResume(): ParsedResume {
  const resume = emptyResume('Jane Doe resume');
  resume.personal_info = {
    ...resume.personal_info,
    full_name: 'Jane Doe',
    email: 'jane@example.com',
    phone: '13800138000',
  };
  resume.technical_skills = {
    ...resume.technical_skills,
    programming_languages: ['Python', 'TypeScript'],
    databases: ['PostgreSQL'],
    tools_software: ['Docker'],
  };
  resume.work_experience = [
    {
      job_title: 'Backend Engineer',
      company: 'Acme',
      location: 'Remote',
      start_date: '2020-01',
      end_date: '2024-01',
      duration: '4 years',
      responsibilities: ['Built payment APIs'],
      achievements: ['Reduced latency by 40%', 'Led the migration to Kubernetes'],
      technologies_used: ['Python'],
    },
  ];
  resume.education = [
    {
      school: 'State University',
      degree: 'BSc',
      major: 'Computer Science',
      start_date: '2015',
      end_date: '2019',
      gpa: '',
      honors: [],
      relevant_courses: [],
    },
  ];
  resume.projects = [
    {
      name: 'Ledger',
      description: 'Open source bookkeeping service',
      role: 'Maintainer',
      duration: '',
      team_size: 3,
      technologies: ['Go'],
      achievements: ['Served 10,000 users'],
      github_url: '',
      demo_url: '',
    },
  ];
  resume.parsing_confidence = 0.9;
  return resume;
}

export function sampleJobDescription(): ParsedJobDescription {
  return {
    title: 'Platform Engineer',
    company: 'Globex',
    location: 'Berlin',
    employment_type: 'full-time',
    experience_level: '3+ years',
    summary: 'Own the deployment platform.',
    requirements: ['3+ years with Python'],
    responsibilities: ['Run Kubernetes clusters'],
    skills_required: ['Python', 'Kubernetes', 'AWS', 'Go'],
    nice_to_have: [],
  };
}

// One-page PDF with a single line of Helvetica text and a correct xref table
export function minimalPdf(line: string): Buffer {
  const content = `BT /F1 12 Tf 20 100 Td (${line}) Tj ET`;
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 200 200] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });
  const xrefAt = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  body += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefAt}\n%%EOF\n`;
  return Buffer.from(body, 'latin1');
}
